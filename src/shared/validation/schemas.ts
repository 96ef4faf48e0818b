import { z } from 'zod';
import { PLAYER_NAME_MAX_LENGTH } from '../engine/types';

// Robot profiles as typed at setup. "Amical" is the historical name of the
// friendly profile and is still accepted.
const ROBOT_PROFILE_ALIASES: Record<string, 'aggressive' | 'friendly'> = {
  aggressive: 'aggressive',
  friendly: 'friendly',
  amical: 'friendly',
};

export const RobotProfileSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const profile = ROBOT_PROFILE_ALIASES[value.toLowerCase()];
    if (!profile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown robot profile "${value}" (expected Aggressive or Friendly)`,
      });
      return z.NEVER;
    }
    return profile;
  });

export type RobotProfile = z.output<typeof RobotProfileSchema>;

export const PlayerSetupSchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1, 'Player name must not be empty')
      .transform((name) => name.slice(0, PLAYER_NAME_MAX_LENGTH)),
    isRobot: z.boolean().default(false),
    profile: RobotProfileSchema.optional(),
  })
  .refine((player) => !player.isRobot || player.profile !== undefined, {
    message: 'A robot player needs a profile',
    path: ['profile'],
  });

export type PlayerSetupInput = z.input<typeof PlayerSetupSchema>;
export type PlayerSetup = z.output<typeof PlayerSetupSchema>;

// Game creation validation
export const GameSetupSchema = z.object({
  players: z.array(PlayerSetupSchema).min(1).max(3),
  seed: z.number().int().min(0).max(0xffffffff).optional(), // Optional board seed for reproducible layouts
});

export type GameSetupInput = z.input<typeof GameSetupSchema>;
export type GameSetup = z.output<typeof GameSetupSchema>;

// Saved game names double as file names.
export const SaveNameSchema = z
  .string()
  .trim()
  .min(1, 'Save name must not be empty')
  .max(64, 'Save name must be at most 64 characters')
  .regex(
    /^[A-Za-z0-9 _-]+$/,
    'Save name can only contain letters, numbers, spaces, underscores, and hyphens'
  );

export type SaveName = z.infer<typeof SaveNameSchema>;

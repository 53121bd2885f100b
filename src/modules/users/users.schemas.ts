/**
 * Users Schemas
 * =============
 * Public user profile shape (API responses and the Redis snapshot cache).
 */

import { z } from "zod";

export const userProfileSchema = z.object({
  id: z.number().int().positive(),
  username: z.string(),
  email: z.string(),
  avatar: z.string().nullable(),
  confirmed: z.boolean(),
  created_at: z.string(),
});

export type UserProfile = z.infer<typeof userProfileSchema>;

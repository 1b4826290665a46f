import { z } from 'zod';

export const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(80),
  password: z.string().min(1, 'Password is required').max(200),
  next: z.string().max(500).optional(),
});

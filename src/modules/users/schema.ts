import { z } from 'zod';

export const registerUserSchema = z.object({
  username: z.string().trim().min(1).max(50),
  password: z.string().min(8).max(128),
  lastName: z.string().trim().min(1).max(100),
  firstName: z.string().trim().min(1).max(100),
  gender: z.string().trim().min(1).max(30),
  email: z.string().trim().toLowerCase().email().max(255),
  registryNumber: z.string().trim().min(1).max(12),
  country: z
    .string()
    .trim()
    .max(50)
    .nullish()
    .transform((value) => value || null),
});

export type RegisterUserInput = z.infer<typeof registerUserSchema>;

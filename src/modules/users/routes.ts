import { Router } from 'express';
import { registerUserSchema } from './schema';
import { UserService } from './service';

export function createUsersRouter(users: UserService): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    const parsed = registerUserSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'INVALID_PAYLOAD', message: 'Invalid payload', details: parsed.error.flatten() });
    }

    try {
      const user = await users.register(parsed.data);
      return res.status(201).json({ data: user });
    } catch (err) {
      return next(err);
    }
  });

  router.get('/', async (_req, res, next) => {
    try {
      const list = await users.list();
      return res.json({ data: list });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}

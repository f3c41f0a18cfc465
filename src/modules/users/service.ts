import { hashPassword } from '../../security/password';
import { safeLogger } from '../../security/safeLogger';
import { DuplicateUserError } from './errors';
import { RegisterUserInput } from './schema';
import { UserStore } from './store';
import { UNIQUE_USER_FIELDS, User } from './types';

export class UserService {
  constructor(private readonly users: UserStore) {}

  async register(input: RegisterUserInput): Promise<User> {
    for (const field of UNIQUE_USER_FIELDS) {
      if (await this.users.findOne(field, input[field])) {
        throw new DuplicateUserError(field);
      }
    }

    const { password, ...profile } = input;
    const user = await this.users.create({ ...profile, passwordHash: await hashPassword(password) });

    safeLogger.info('user.registered', { userId: user.id });
    return user;
  }

  list(): Promise<User[]> {
    return this.users.list();
  }
}

import { AppError } from '../../errors';
import { UniqueUserField } from './types';

const DUPLICATE_MESSAGES: Record<UniqueUserField, string> = {
  username: 'Username already registered',
  email: 'Email already registered',
  registryNumber: 'Register ID already registered',
};

export class DuplicateUserError extends AppError {
  constructor(readonly field: UniqueUserField) {
    super('DUPLICATE_USER', DUPLICATE_MESSAGES[field]);
  }

  details(): Record<string, unknown> {
    return { field: this.field };
  }
}

export class UnknownUserError extends AppError {
  constructor(readonly userId: string) {
    super('USER_NOT_FOUND', `User '${userId}' does not exist`);
  }
}

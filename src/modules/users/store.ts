import { Connection, FilterQuery, Model, isValidObjectId, mongo } from 'mongoose';
import { DuplicateUserError } from './errors';
import { LeanUserRow, UserRow, userModelFor } from './user.model';
import { NewUser, UNIQUE_USER_FIELDS, UniqueUserField, User } from './types';

export interface UserStore {
  create(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findOne(field: UniqueUserField, value: string): Promise<User | null>;
  list(): Promise<User[]>;
}

const COLUMN_BY_FIELD: Record<UniqueUserField, keyof UserRow> = {
  username: 'accountName',
  email: 'email',
  registryNumber: 'registerId',
};

export class MongoUserStore implements UserStore {
  private readonly model: Model<UserRow>;

  constructor(connection: Connection) {
    this.model = userModelFor(connection);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const doc = await this.model.create({
        accountName: user.username,
        passwordHash: user.passwordHash,
        surname: user.lastName,
        firstName: user.firstName,
        gender: user.gender,
        email: user.email,
        registerId: user.registryNumber,
        country: user.country,
      });
      return fromUserRow(doc.toObject<LeanUserRow>());
    } catch (err) {
      const field = duplicateField(err);
      if (field) throw new DuplicateUserError(field);
      throw err;
    }
  }

  async findById(id: string): Promise<User | null> {
    if (!isValidObjectId(id)) return null;
    const row = await this.model.findById(id).lean<LeanUserRow>();
    return row ? fromUserRow(row) : null;
  }

  async findOne(field: UniqueUserField, value: string): Promise<User | null> {
    const row = await this.model.findOne(uniqueFilter(field, value)).lean<LeanUserRow>();
    return row ? fromUserRow(row) : null;
  }

  async list(): Promise<User[]> {
    const rows = await this.model.find().sort({ createdAt: 1 }).lean<LeanUserRow[]>();
    return rows.map(fromUserRow);
  }
}

function uniqueFilter(field: UniqueUserField, value: string): FilterQuery<UserRow> {
  switch (field) {
    case 'username':
      return { accountName: value };
    case 'email':
      return { email: value };
    case 'registryNumber':
      return { registerId: value };
  }
}

// Unique indexes still fire when two registrations race past the lookups.
export function duplicateField(err: unknown): UniqueUserField | null {
  if (!(err instanceof mongo.MongoServerError) || err.code !== 11000) return null;
  const columns = 'keyPattern' in err && err.keyPattern && typeof err.keyPattern === 'object' ? Object.keys(err.keyPattern) : [];
  return UNIQUE_USER_FIELDS.find((field) => columns.includes(COLUMN_BY_FIELD[field])) ?? null;
}

export function fromUserRow(row: LeanUserRow): User {
  return {
    id: row._id.toString(),
    username: row.accountName,
    firstName: row.firstName,
    lastName: row.surname,
    gender: row.gender,
    email: row.email,
    registryNumber: row.registerId,
    country: row.country ?? null,
    createdAt: row.createdAt.toISOString(),
  };
}

import { Connection, Model, Schema, Types } from 'mongoose';

export type UserRow = {
  accountName: string;
  passwordHash: string;
  surname: string;
  firstName: string;
  gender: string;
  email: string;
  registerId: string;
  country: string | null;
  createdAt: Date;
};

export type LeanUserRow = UserRow & { _id: Types.ObjectId };

const UserSchema = new Schema<UserRow>(
  {
    accountName: { type: String, required: true, unique: true, maxlength: 50 },
    passwordHash: { type: String, required: true },
    surname: { type: String, required: true, maxlength: 100 },
    firstName: { type: String, required: true, maxlength: 100 },
    gender: { type: String, required: true, maxlength: 30 },
    email: { type: String, required: true, unique: true, maxlength: 255 },
    registerId: { type: String, required: true, unique: true, maxlength: 12 },
    country: { type: String, default: null, maxlength: 50 },
    createdAt: { type: Date, default: Date.now },
  },
  { versionKey: false }
);

export function userModelFor(connection: Connection): Model<UserRow> {
  return connection.model<UserRow>('User', UserSchema, 'user_information');
}

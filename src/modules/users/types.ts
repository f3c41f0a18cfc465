export type User = {
  id: string;
  username: string;
  firstName: string;
  lastName: string;
  gender: string;
  email: string;
  registryNumber: string;
  country: string | null;
  createdAt: string;
};

export type NewUser = Omit<User, 'id' | 'createdAt'> & { passwordHash: string };

/** Fields that identify a user on their own, checked in this order on registration. */
export const UNIQUE_USER_FIELDS = ['username', 'email', 'registryNumber'] as const;

export type UniqueUserField = (typeof UNIQUE_USER_FIELDS)[number];

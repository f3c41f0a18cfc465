import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../app';
import { AppConfig } from '../../config';
import { InstrumentRegistry } from '../surveys/registry';
import { verifyPassword } from '../../security/password';
import { InMemoryResultStore, InMemoryUserStore } from '../../testing/memoryStores';

const config: AppConfig = {
  nodeEnv: 'test',
  port: 0,
  databaseUrl: 'mongodb://127.0.0.1:27017/survey-intake-test',
  corsOrigins: ['http://localhost:3000'],
  defaultLocale: 'mn',
};

const registration = {
  username: 'bat',
  password: 'test-password',
  lastName: 'Dorj',
  firstName: 'Bat',
  gender: 'male',
  email: 'Bat@Example.test',
  registryNumber: 'AA00000001',
  country: 'Mongolia',
};

let app: Express;
let users: InMemoryUserStore;

beforeEach(() => {
  jest.spyOn(console, 'info').mockImplementation(() => {});
  users = new InMemoryUserStore();
  app = createApp({ config, registry: new InstrumentRegistry(), userStore: users, resultStore: new InMemoryResultStore() });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('POST /api/users', () => {
  it('registers a user without echoing the password', async () => {
    const res = await request(app).post('/api/users').send(registration);

    expect(res.status).toBe(201);
    expect(res.body.data).toMatchObject({
      id: 'user-1',
      username: 'bat',
      firstName: 'Bat',
      lastName: 'Dorj',
      email: 'bat@example.test',
      registryNumber: 'AA00000001',
      country: 'Mongolia',
    });
    expect(res.body.data).not.toHaveProperty('password');
    expect(res.body.data).not.toHaveProperty('passwordHash');
  });

  it('stores a verifiable password hash', async () => {
    await request(app).post('/api/users').send(registration).expect(201);

    const hash = users.passwordHashOf('user-1');
    expect(hash).toBeDefined();
    expect(hash).not.toBe('test-password');
    await expect(verifyPassword('test-password', hash ?? '')).resolves.toBe(true);
  });

  it('stores a missing country as null', async () => {
    const { country: _country, ...withoutCountry } = registration;
    const res = await request(app).post('/api/users').send(withoutCountry);

    expect(res.status).toBe(201);
    expect(res.body.data.country).toBeNull();
  });

  it.each([
    ['username', { email: 'other@example.test', registryNumber: 'BB00000002' }, 'Username already registered'],
    ['email', { username: 'other', registryNumber: 'BB00000002' }, 'Email already registered'],
    ['registryNumber', { username: 'other', email: 'other@example.test' }, 'Register ID already registered'],
  ])('rejects a duplicate %s', async (field, overrides, message) => {
    await request(app).post('/api/users').send(registration).expect(201);
    const res = await request(app)
      .post('/api/users')
      .send({ ...registration, ...overrides });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: 'DUPLICATE_USER', field, message });
  });

  it('rejects an invalid body', async () => {
    const { email: _email, ...withoutEmail } = registration;
    const res = await request(app).post('/api/users').send(withoutEmail);

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('INVALID_PAYLOAD');
    expect(res.body.details.fieldErrors.email).toBeDefined();
  });
});

describe('GET /api/users', () => {
  it('lists registered users', async () => {
    await request(app).post('/api/users').send(registration).expect(201);
    await request(app)
      .post('/api/users')
      .send({ ...registration, username: 'saraa', email: 'saraa@example.test', registryNumber: 'CC00000003' })
      .expect(201);

    const res = await request(app).get('/api/users');

    expect(res.status).toBe(200);
    expect(res.body.data.map((u: { username: string }) => u.username)).toEqual(['bat', 'saraa']);
  });
});

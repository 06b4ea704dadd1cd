import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { eq } from 'drizzle-orm';
import { createAuth, type Auth } from '../src/auth';
import { blogs, users } from '../src/db/schema';
import { ensureAdmin } from '../src/services/adminBootstrap';
import { createTestDb, insertUser, resetDb, type TestDatabase } from './helpers/db';
import { testConfig } from './helpers/app';

describe('ensureAdmin', () => {
  let testDb: TestDatabase;
  let auth: Auth;

  const admin = { username: 'admin', email: 'admin@example.com', password: 'test-password' };

  beforeAll(async () => {
    testDb = await createTestDb();
    auth = createAuth(testDb.db, testConfig());
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDb(testDb.db);
  });

  it('skips when no password is configured', async () => {
    expect(await ensureAdmin(auth, testDb.db, { ...admin, password: undefined })).toBe('skipped');
    expect(await testDb.db.$count(users)).toBe(0);
  });

  it('creates a staff superuser with a blog, then does nothing', async () => {
    expect(await ensureAdmin(auth, testDb.db, admin)).toBe('created');
    expect(await ensureAdmin(auth, testDb.db, admin)).toBe('exists');

    const rows = await testDb.db.select().from(users);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      username: 'admin',
      email: 'admin@example.com',
      isStaff: true,
      isSuperuser: true,
    });

    const [blog] = await testDb.db.select().from(blogs).where(eq(blogs.userId, rows[0].id));
    expect(blog?.title).toBe("admin's Blog");
  });

  it('leaves an existing account untouched', async () => {
    await insertUser(testDb.db, 'admin');

    expect(await ensureAdmin(auth, testDb.db, admin)).toBe('exists');

    const [row] = await testDb.db.select().from(users);
    expect(row).toMatchObject({ isStaff: false, isSuperuser: false });
  });

  it('lets the new admin sign in with the configured password', async () => {
    await ensureAdmin(auth, testDb.db, admin);

    const response = await auth.api.signInEmail({
      body: { email: admin.email, password: admin.password },
      asResponse: true,
    });
    expect(response.status).toBe(200);
  });
});

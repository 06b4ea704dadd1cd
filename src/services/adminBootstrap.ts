import { eq } from 'drizzle-orm';
import debug from 'debug';
import type { Auth } from '../auth';
import type { AppConfig } from '../config';
import type { Database } from '../db/index';
import { users } from '../db/schema';

const debugLog = debug('inkwell:auth');

export type AdminBootstrapResult = 'created' | 'exists' | 'skipped';

/**
 * Makes sure the configured administrator account exists. Signs the user up
 * through Better Auth (so the account gets a password and a blog), then grants
 * staff and superuser rights. Safe to run on every deploy.
 */
export async function ensureAdmin(
  auth: Auth,
  db: Database,
  admin: AppConfig['admin'],
): Promise<AdminBootstrapResult> {
  if (!admin.password) {
    debugLog('ADMIN_PASSWORD not set, skipping admin creation');
    return 'skipped';
  }

  const [existing] = await db
    .select({ id: users.id })
    .from(users)
    .where(eq(users.username, admin.username))
    .limit(1);
  if (existing) {
    return 'exists';
  }

  const { user } = await auth.api.signUpEmail({
    body: {
      name: admin.username,
      email: admin.email,
      password: admin.password,
      username: admin.username,
    },
  });

  await db
    .update(users)
    .set({ isStaff: true, isSuperuser: true, emailVerified: true, updatedAt: new Date() })
    .where(eq(users.id, user.id));

  return 'created';
}

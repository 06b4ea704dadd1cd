import { and, asc, eq, ilike, or, type SQL } from 'drizzle-orm';
import type { Database } from '../db/index';
import { users } from '../db/schema';
import type { User } from '../types/blog';
import type { UpdateUserInput, UserFilters } from '../schemas/blog';
import { escapeLike } from '../utils/sql';

// Columns exposed when a user is nested inside a blog
export const userSummaryColumns = {
  id: users.id,
  username: users.username,
  name: users.name,
  email: users.email,
};

const userColumns = {
  ...userSummaryColumns,
  isStaff: users.isStaff,
  isSuperuser: users.isSuperuser,
  createdAt: users.createdAt,
  updatedAt: users.updatedAt,
};

export class UserService {
  constructor(private readonly db: Database) {}

  // List users, optionally searching username/email/name and filtering on staff status
  async listUsers(filters: UserFilters = {}): Promise<User[]> {
    const conditions: SQL[] = [];

    if (filters.search) {
      const pattern = `%${escapeLike(filters.search)}%`;
      const searchCondition = or(
        ilike(users.username, pattern),
        ilike(users.email, pattern),
        ilike(users.name, pattern),
      );
      if (searchCondition) conditions.push(searchCondition);
    }
    if (filters.isStaff !== undefined) {
      conditions.push(eq(users.isStaff, filters.isStaff));
    }

    return this.db
      .select(userColumns)
      .from(users)
      .where(and(...conditions))
      .orderBy(asc(users.username));
  }

  async getUserById(id: string): Promise<User | null> {
    const [user] = await this.db.select(userColumns).from(users).where(eq(users.id, id)).limit(1);
    return user ?? null;
  }

  async updateUser(id: string, data: UpdateUserInput): Promise<User | null> {
    const [user] = await this.db
      .update(users)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(users.id, id))
      .returning(userColumns);
    return user ?? null;
  }

  // Sessions, accounts, the blog and its posts go with the user (ON DELETE CASCADE)
  async deleteUser(id: string): Promise<boolean> {
    const deleted = await this.db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
    return deleted.length > 0;
  }
}

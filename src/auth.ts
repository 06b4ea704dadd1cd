import { betterAuth } from "better-auth";
import { drizzleAdapter } from "better-auth/adapters/drizzle";
import { APIError } from "better-auth/api";
import { eq } from "drizzle-orm";
import debug from "debug";
import type { Database } from "./db/index";
import { users, sessions, accounts, verifications } from "./db/schema";
import type { AppConfig } from "./config";
import { BlogService } from "./services/blogService";

const debugLog = debug("inkwell:auth");

export const USERNAME_ALPHANUMERIC_ONLY =
  "Username can only contain letters and numbers. No special characters allowed.";

export const USERNAME_TOO_SHORT = "Username must be at least 3 characters long.";
export const USERNAME_TOO_LONG = "Username cannot exceed 30 characters.";

const USERNAME_PATTERN = /^[a-zA-Z0-9]+$/;

function usernameProblem(username: unknown): string | null {
  if (typeof username !== "string") return USERNAME_ALPHANUMERIC_ONLY;
  if (username.length < 3) return USERNAME_TOO_SHORT;
  if (username.length > 30) return USERNAME_TOO_LONG;
  return USERNAME_PATTERN.test(username) ? null : USERNAME_ALPHANUMERIC_ONLY;
}

export function createAuth(db: Database, config: AppConfig) {
  const blogService = new BlogService(db);

  return betterAuth({
    baseURL: config.baseUrl,
    basePath: "/api/auth",
    secret: config.authSecret,
    trustedOrigins: [
      config.baseUrl,
      config.frontendUrl,
    ].filter((url): url is string => Boolean(url)),
    database: drizzleAdapter(db, {
      provider: "pg",
      schema: {
        user: users,
        session: sessions,
        account: accounts,
        verification: verifications,
      },
    }),
    emailAndPassword: {
      enabled: true,
      minPasswordLength: 8,
      maxPasswordLength: 128,
    },
    user: {
      additionalFields: {
        username: {
          type: "string",
          required: true,
          unique: true,
          input: true,
        },
        isStaff: {
          type: "boolean",
          required: false,
          defaultValue: false,
          input: false,
        },
        isSuperuser: {
          type: "boolean",
          required: false,
          defaultValue: false,
          input: false,
        },
      },
    },
    session: {
      expiresIn: 60 * 60 * 24 * 7, // 7 days
      updateAge: 60 * 60 * 24, // 1 day
    },
    advanced: {
      defaultCookieAttributes: {
        sameSite: "lax",
        secure: config.env === "production",
        httpOnly: true,
      },
    },
    databaseHooks: {
      user: {
        create: {
          before: async (user) => {
            const problem = usernameProblem("username" in user ? user.username : undefined);
            if (problem) {
              throw new APIError("BAD_REQUEST", { message: problem });
            }
          },
          // Every new account gets its blog straight away
          after: async (user) => {
            const [created] = await db
              .select({ id: users.id, username: users.username })
              .from(users)
              .where(eq(users.id, user.id))
              .limit(1);

            if (!created) {
              console.error(`❌ User ${user.id} not found after sign-up`);
              return;
            }

            const blog = await blogService.ensureBlogForUser(created);
            debugLog(`Blog "${blog.title}" ready for user ${created.username}`);
          },
        },
      },
    },
  });
}

export type Auth = ReturnType<typeof createAuth>;

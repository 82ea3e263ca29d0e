import { defineConfig } from 'drizzle-kit';

/**
 * Drizzle Kit Configuration
 *
 * Usage:
 *   npx drizzle-kit generate  # Generate migrations
 *   npx drizzle-kit migrate   # Run migrations
 *   npx drizzle-kit studio    # Open Drizzle Studio
 */
export default defineConfig({
  schema: './src/db/schema/index.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgresql://localhost:5432/rag',
  },
  verbose: true,
  strict: true,
});

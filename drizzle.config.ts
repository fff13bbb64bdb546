import { defineConfig } from 'drizzle-kit';

/**
 * Drizzle Kit Configuration
 *
 * The chunk_vectors table needs the pgvector extension:
 *   CREATE EXTENSION IF NOT EXISTS vector;
 *
 * Usage:
 *   npm run db:generate  # Generate migrations
 *   npm run db:migrate   # Run migrations
 */
export default defineConfig({
  schema: './src/db/schema/index.ts',
  out: './src/db/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});

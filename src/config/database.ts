import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create the Supabase client (singleton)
 *
 * Uses the service role key: the API is the only writer and enforces
 * authorization itself, so row level security is bypassed.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

/**
 * Verify that the database is reachable and the schema is migrated
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const { error } = await getSupabaseClient().from('items').select('id').limit(1);

    if (error) {
      logger.error('Database connection test failed', { error: error.message });
      return false;
    }

    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error });
    return false;
  }
};

/**
 * Drop the client reference (for graceful shutdown)
 */
export const closeConnection = (): void => {
  if (supabaseClient) {
    // supabase-js keeps no sockets open between requests
    supabaseClient = null;
    logger.info('Supabase client connection closed');
  }
};

export default getSupabaseClient;

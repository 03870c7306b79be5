/**
 * Production container: Supabase repositories, Axiom logging when
 * configured, console logging otherwise.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { createSupabaseClient } from './db.js';
import { SupabaseUserRepository } from './repositories/SupabaseUserRepository.js';
import { SupabaseArticleRepository } from './repositories/SupabaseArticleRepository.js';
import { SupabaseCommentRepository } from './repositories/SupabaseCommentRepository.js';
import { AxiomLogProvider, ConsoleLogProvider } from './providers/index.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();
  if (!config.supabase) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  const db = createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  const logProvider = config.axiom
    ? new AxiomLogProvider(config.axiom)
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info', retainEvents: false });

  cached = createContainer({
    userRepo: new SupabaseUserRepository(db),
    articleRepo: new SupabaseArticleRepository(db),
    commentRepo: new SupabaseCommentRepository(db),
    logProvider,
    jwt: config.jwt,
  });

  return cached;
}

/**
 * Netlify Function entry point.
 * Single function handles all /api/* routes via the router.
 * The container is built once per cold start and shared across warm
 * invocations.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';
import { createContext } from '../../src/middleware/pipeline.js';

const container = getProductionContainer();
const router = createRouter(container);

export default async (req: Request, _context: Context) => {
  const response = await router.handle(req, createContext());
  // Ship buffered log events before the function freezes
  await container.logProvider.flush();
  return response;
};

export const config = {
  path: '/api/*',
};

/**
 * GET /api/tags: every tag in use.
 */

import { pipeline } from '../middleware/pipeline.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './respond.js';

export function createTagHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, container.errorHandler)(async () => {
    return json(await container.articleQueryService.listTags());
  });

  return { list };
}

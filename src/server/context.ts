/**
 * Services shared by the route handlers
 */

import { ConfigurationError } from "../errors.js";

import type { DdiClient } from "../ddi/client.js";
import type { AttributeMapper } from "../mapping/attribute-mapper.js";
import type { SyncJobQueue } from "../services/sync/queue.js";

export interface ServerContext {
  /** null when no DDI store is configured */
  ddi: DdiClient | null;
  queue: SyncJobQueue;
  mapper: AttributeMapper;
}

/**
 * @throws ConfigurationError when no DDI store is configured
 */
export function requireDdiClient(context: ServerContext): DdiClient {
  if (context.ddi === null) {
    throw new ConfigurationError(
      "DDI store is not configured; set DDI_HOST, DDI_USERNAME and DDI_PASSWORD"
    );
  }
  return context.ddi;
}

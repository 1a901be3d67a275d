import { serverLogger as logger } from "../../logger.js";
import { DatabaseError } from "../plugins/error-handler.js";

import type { PipelineConfig } from "../../config/index.js";
import type { WarehouseStore } from "../../store/types.js";

/**
 * What the route modules read from: the warehouse and the pipeline
 * configuration the server was started with
 */
export interface ApiContext {
  store: WarehouseStore;
  config: Readonly<PipelineConfig>;
}

/**
 * Await a store call, turning driver failures into a 503
 */
export async function fromStore<T>(
  operation: string,
  query: Promise<T>
): Promise<T> {
  try {
    return await query;
  } catch (error) {
    logger.error({ err: error, operation }, "Warehouse query failed");
    throw new DatabaseError(`Warehouse unavailable (${operation})`);
  }
}

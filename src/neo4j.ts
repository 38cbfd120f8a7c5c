import neo4j, { type Driver } from 'neo4j-driver';

import type { AppConfig } from './config.js';
import { logger } from './utils/logger.js';

export async function createNeo4jDriver(config: AppConfig): Promise<Driver | null> {
  if (!config.neo4j) {
    logger.warn('Neo4j credentials missing; serving the bundled seed frame only.');
    return null;
  }
  const { uri, username, password } = config.neo4j;
  return neo4j.driver(uri, neo4j.auth.basic(username, password));
}

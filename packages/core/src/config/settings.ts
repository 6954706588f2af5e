/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Neo4j settings read from environment variables.
 *
 * All variables use the NEO4J_ prefix: NEO4J_URI, NEO4J_USERNAME,
 * NEO4J_PASSWORD and NEO4J_INDEX_NAME. Constructor options always win over
 * these values.
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const neo4jSettingsSchema = z.object({
  NEO4J_URI: optionalString,
  NEO4J_USERNAME: optionalString,
  NEO4J_PASSWORD: optionalString,
  NEO4J_INDEX_NAME: optionalString,
});

export interface Neo4jSettings {
  uri?: string;
  username?: string;
  password?: string;
  indexName?: string;
}

export type Environment = Record<string, string | undefined>;

/**
 * Read Neo4j settings from an environment (default: `process.env`).
 *
 * Blank values count as unset.
 */
export function loadNeo4jSettings(
  env: Environment = process.env,
): Neo4jSettings {
  const parsed = neo4jSettingsSchema.parse(env);
  return {
    uri: parsed.NEO4J_URI,
    username: parsed.NEO4J_USERNAME,
    password: parsed.NEO4J_PASSWORD,
    indexName: parsed.NEO4J_INDEX_NAME,
  };
}

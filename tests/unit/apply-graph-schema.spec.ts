/**
 * Graph Schema Script Unit Tests
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  applyGraphSchema,
  DEFAULT_SCHEMA_PATH,
  locateSchemaFile,
  splitBatches,
} from '../../src/scripts/apply-graph-schema.js';
import { FakeConnection } from '../support/fake-connection.js';

const testDir = path.dirname(fileURLToPath(import.meta.url));
const fixture = path.resolve(testDir, '../fixtures/schema.sql');
const bundledSchema = path.resolve(testDir, '../../sql/graph-schema.sql');

describe('applyGraphSchema', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  describe('splitBatches', () => {
    it('should split on GO lines and drop empty or comment-only batches', () => {
      const script = 'CREATE TABLE a (x INT)\r\nGO\r\n-- only a comment\ngo;\nSELECT 1\n  GO  \n';

      expect(splitBatches(script)).toEqual(['CREATE TABLE a (x INT)', 'SELECT 1']);
    });

    it('should not split on words that start with GO', () => {
      expect(splitBatches('SELECT 1\nGOTO done')).toEqual(['SELECT 1\nGOTO done']);
    });
  });

  it('should run each batch as its own command', async () => {
    const connection = new FakeConnection();

    const applied = await applyGraphSchema(connection, { schemaPath: fixture, timeoutSeconds: 60 });

    expect(applied).toBe(2);
    expect(connection.texts).toEqual([
      '-- Fixture schema\n\nCREATE TABLE Person (Name NVARCHAR(100)) AS NODE;',
      'CREATE TABLE Knows AS EDGE;',
    ]);
    expect(connection.commands.map((c) => c.timeoutSeconds)).toEqual([60, 60]);
    expect(console.log).toHaveBeenCalledWith('[GraphSchema] Batch 2/2 applied');
  });

  it('should apply the bundled schema by default', async () => {
    const connection = new FakeConnection();

    expect(await applyGraphSchema(connection)).toBe(4);
    expect(connection.texts.at(-1)).toBe(
      "IF OBJECT_ID('dbo.LivesIn', 'U') IS NULL\n  CREATE TABLE dbo.LivesIn AS EDGE;",
    );
    expect(DEFAULT_SCHEMA_PATH).toBe(bundledSchema);
  });

  it('should find the bundled schema from a build directory', () => {
    const buildDir = path.resolve(testDir, '../../dist/src/scripts');

    expect(locateSchemaFile(buildDir)).toBe(bundledSchema);
  });

  it('should fail when the schema file is missing', async () => {
    const missing = path.resolve('/nonexistent/schema.sql');

    await expect(applyGraphSchema(new FakeConnection(), { schemaPath: missing })).rejects.toThrow(
      `Schema file not found at: ${missing}`,
    );
  });
});

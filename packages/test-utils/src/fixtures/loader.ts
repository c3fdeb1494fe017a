/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * A named test position
 */
export interface PositionFixture {
  fen: string;
  description: string;
}

export type PositionName =
  | 'start'
  | 'afterE4'
  | 'whiteMateInOne'
  | 'blackMateInOne'
  | 'foolsMate'
  | 'stalemate'
  | 'promotion'
  | 'kingsOnly';

/**
 * Get the absolute path to the fixtures directory
 */
function getFixturesRoot(): string {
  return path.join(__dirname, 'positions');
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

function isPositionFixture(value: unknown): value is PositionFixture {
  return (
    typeof value === 'object' &&
    value !== null &&
    'fen' in value &&
    typeof value.fen === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

let cache: Map<string, PositionFixture> | null = null;

function loadAll(): Map<string, PositionFixture> {
  if (cache) return cache;
  const raw: unknown = JSON.parse(fs.readFileSync(getFixturePath('positions.json'), 'utf-8'));
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('positions.json must hold an object');
  }
  const positions = new Map<string, PositionFixture>();
  for (const [name, entry] of Object.entries(raw)) {
    if (!isPositionFixture(entry)) {
      throw new Error(`Position fixture "${name}" needs fen and description`);
    }
    positions.set(name, entry);
  }
  cache = positions;
  return positions;
}

/**
 * Load a named position fixture
 */
export function loadPosition(name: PositionName): PositionFixture {
  const position = loadAll().get(name);
  if (!position) {
    throw new Error(`Position fixture not found: ${name}`);
  }
  return position;
}

/**
 * FEN of a named position fixture
 */
export function fenOf(name: PositionName): string {
  return loadPosition(name).fen;
}

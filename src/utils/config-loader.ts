import { fileURLToPath } from 'url';
import { resolve, dirname, isAbsolute } from 'path';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { marketCalendarSchema, type MarketCalendarDefinition } from '../lib/market-calendar.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
// In dev (tsx): src/utils/ → ../../config = <root>/config
// In prod (node dist/): dist/utils/ → ../../config = <root>/config
const configDir = resolve(__dirname, '../../config');

const symbolsSchema = z.array(z.string().regex(/^[A-Z.]{1,6}$/)).min(1);

function resolveConfigPath(file: string): string {
  return isAbsolute(file) ? file : resolve(configDir, file);
}

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(resolveConfigPath(file), 'utf-8'));
}

/** Symbol universe for the setup sweep (deduplicated, order kept). */
export function loadSymbols(file = 'symbols.json'): string[] {
  const symbols = symbolsSchema.parse(readJson(file));
  return [...new Set(symbols)];
}

export function loadMarketCalendar(file = 'market-calendar.json'): MarketCalendarDefinition {
  return marketCalendarSchema.parse(readJson(file));
}

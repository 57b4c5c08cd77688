import fs from 'fs/promises';
import path from 'path';
import type { TrendDirection } from './klines';
import { emptyRun } from './runDetector';
import type { RunState } from './runDetector';

export interface ProtectionState extends RunState {
  baselineVolatility: number | null;
  protectionActive: boolean;
  hibernationStartedAt: number | null;
  /** Open time of the last bar folded into the run; older or repeated bars are skipped. */
  lastBarAt: number | null;
}

export interface ProtectionStateStore {
  load(): Promise<ProtectionState | null>;
  save(state: ProtectionState): Promise<void>;
}

export function defaultProtectionState(): ProtectionState {
  return {
    ...emptyRun(),
    baselineVolatility: null,
    protectionActive: false,
    hibernationStartedAt: null,
    lastBarAt: null,
  };
}

function isDirection(value: unknown): value is TrendDirection {
  return value === 'neutral' || value === 'up' || value === 'down';
}

function numberOr<T>(value: unknown, fallback: T): number | T {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Restores a persisted record, filling gaps with defaults and repairing the
 * two structural invariants (neutral run has no move; active implies a start time).
 */
export function coerceProtectionState(raw: unknown, now = Date.now()): ProtectionState {
  const base = defaultProtectionState();
  if (typeof raw !== 'object' || raw === null) return base;
  const read = (key: string): unknown => Reflect.get(raw, key);

  const direction = read('direction');
  const state: ProtectionState = {
    direction: isDirection(direction) ? direction : 'neutral',
    consecutiveBars: numberOr(read('consecutiveBars'), 0),
    cumulativeMovePct: numberOr(read('cumulativeMovePct'), 0),
    runStartPrice: numberOr(read('runStartPrice'), null),
    runStartedAt: numberOr(read('runStartedAt'), null),
    baselineVolatility: numberOr(read('baselineVolatility'), null),
    protectionActive: read('protectionActive') === true,
    hibernationStartedAt: numberOr(read('hibernationStartedAt'), null),
    lastBarAt: numberOr(read('lastBarAt'), null),
  };
  if (state.direction === 'neutral') {
    Object.assign(state, emptyRun());
  }
  if (state.protectionActive && state.hibernationStartedAt === null) {
    state.hibernationStartedAt = now;
  }
  return state;
}

export class FileProtectionStateStore implements ProtectionStateStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<ProtectionState | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(text);
    return coerceProtectionState(parsed);
  }

  async save(state: ProtectionState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 2), 'utf8');
    await fs.rename(tmp, this.filePath);
  }
}

import type { LogFn } from '../app/AppContext';
import { APP_CONFIG } from '../config/appConfig';

/** The subset of Web Storage the preference needs. */
export type PrefStorage = Pick<Storage, 'getItem' | 'setItem'>;

/** 0 = rotate right (clockwise), 1 = rotate left. */
export type DirectionIndex = 0 | 1;

export function isClockwise(index: DirectionIndex): boolean {
  return index === 0;
}

export function parseDirectionIndex(raw: string | null | undefined): DirectionIndex {
  return raw?.trim() === '1' ? 1 : 0;
}

/**
 * Read the last selected rotation direction. Anything missing or unreadable
 * falls back to 0 (clockwise).
 */
export function loadDirectionIndex(storage: PrefStorage | null, log: LogFn = console.warn): DirectionIndex {
  if (!storage) return 0;
  try {
    return parseDirectionIndex(storage.getItem(APP_CONFIG.DIRECTION_PREF_KEY));
  } catch (err) {
    log(`Could not read ${APP_CONFIG.DIRECTION_PREF_KEY}: ${String(err)}`);
    return 0;
  }
}

export function saveDirectionIndex(storage: PrefStorage | null, index: DirectionIndex, log: LogFn = console.warn): void {
  if (!storage) return;
  try {
    storage.setItem(APP_CONFIG.DIRECTION_PREF_KEY, String(index));
  } catch (err) {
    log(`Could not save ${APP_CONFIG.DIRECTION_PREF_KEY}: ${String(err)}`);
  }
}

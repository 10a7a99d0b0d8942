import type { LogFn, RotatingView } from './AppContext';
import { isClockwise, loadDirectionIndex, parseDirectionIndex, saveDirectionIndex } from '../prefs/directionPref';
import type { DirectionIndex, PrefStorage } from '../prefs/directionPref';
import { onChange } from '../ui/safeDom';

/**
 * Restore the saved direction into the control and the views, then keep both
 * in sync with the user's choice. Returns the restored index.
 */
export function bindDirectionControl(
  sel: HTMLSelectElement,
  views: readonly RotatingView[],
  storage: PrefStorage | null,
  log: LogFn,
): DirectionIndex {
  const initial = loadDirectionIndex(storage, log);
  sel.value = String(initial);
  for (const v of views) v.setClockwise(isClockwise(initial));

  onChange(sel, () => {
    const index = parseDirectionIndex(sel.value);
    for (const v of views) v.setClockwise(isClockwise(index));
    saveDirectionIndex(storage, index, log);
  });

  return initial;
}

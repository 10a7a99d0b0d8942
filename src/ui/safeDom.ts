/**
 * Tiny DOM safety helpers.
 */

export function onChange(
  el: { addEventListener: (type: string, listener: () => void) => void } | null | undefined,
  listener: () => void,
): void {
  if (!el) return;
  el.addEventListener('change', listener);
}

/**
 * Query an element and throw a friendly error if missing.
 */
export function requireEl<T extends Element>(selector: string, root: ParentNode = document): T {
  const found = root.querySelector<T>(selector);
  if (!found) {
    throw new Error(`Missing required element: ${selector}`);
  }
  return found;
}

import type { ErrorIndicatorPort, TickLabelsPort } from '../app/AppContext';

/**
 * Error delta label. Hidden means transparent, so the layout does not jump.
 */
export class DomErrorLabel implements ErrorIndicatorPort {
  constructor(private readonly el: HTMLElement) {}

  show(delta: number): void {
    this.el.style.opacity = '1';
    this.el.style.color = 'yellow';
    this.el.style.backgroundColor = 'black';
    this.el.textContent = `Error delta: ${delta}`;
  }

  hide(): void {
    this.el.style.opacity = '0';
  }
}

export class DomTickLabels implements TickLabelsPort {
  constructor(private readonly elapsed: HTMLElement, private readonly counts: readonly HTMLElement[]) {}

  setElapsedSeconds(seconds: number): void {
    this.elapsed.textContent = `${seconds}`;
  }

  setRotationCount(text: string): void {
    for (const el of this.counts) el.textContent = text;
  }
}

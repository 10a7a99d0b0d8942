import type { ViewDefinition } from '../config/viewDefinitions';
import { requireEl } from './safeDom';

export type ViewRefs = {
  def: ViewDefinition;
  container: HTMLElement;
  countLabel: HTMLElement;
  errorLabel: HTMLElement;
};

export type HudRefs = {
  app: HTMLElement;
  elapsedLabel: HTMLElement;
  directionSel: HTMLSelectElement;
  views: ViewRefs[];
};

export function createHud(defs: readonly ViewDefinition[], root: ParentNode = document): HudRefs {
  const app = requireEl<HTMLElement>('#app', root);
  const elapsedLabel = requireEl<HTMLElement>('#elapsed', root);
  const directionSel = requireEl<HTMLSelectElement>('#directionSel', root);

  const views = defs.map((def) => {
    const container = requireEl<HTMLElement>(`#${def.id}View`, root);
    container.style.border = '2px solid black';
    return {
      def,
      container,
      countLabel: requireEl<HTMLElement>(`#${def.id}Count`, root),
      errorLabel: requireEl<HTMLElement>(`#${def.id}Error`, root),
    };
  });

  return { app, elapsedLabel, directionSel, views };
}

import { InvalidConfigError } from "../../domain/errors";
import type { CardJobConfig, CardLayout } from "../../domain/models";

export interface LayoutPlanParams {
  recordCount: number;
  config: CardJobConfig;
}

export interface LayoutEngine {
  readonly id: string;
  plan(params: LayoutPlanParams): CardLayout;
}

export function resolveEngine(layoutVersion: string, engines: LayoutEngine[]): LayoutEngine {
  const engine = engines.find((e) => e.id === layoutVersion);
  if (!engine) {
    throw new InvalidConfigError(`Motor de layout no registrado: ${layoutVersion}`);
  }
  return engine;
}

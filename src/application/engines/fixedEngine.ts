import { LAYOUT_FIXED_V1, LAYOUT_PAGE_PER_RECORD_V1 } from "../../domain/models";
import type { CardJobConfig, CardLayout, CardSlot } from "../../domain/models";
import type { LayoutEngine, LayoutPlanParams } from "./index";

function fixedSlot(config: CardJobConfig, pageIndex: number): CardSlot {
  return {
    pageIndex,
    name: { ...config.textPosition, size: config.textSize, align: "left" },
    barcode: { ...config.imageBox, fit: "stretch" },
  };
}

/**
 * Una sola pagina y coordenadas fijas para todos los registros.
 * Cada tarjeta se dibuja encima de la anterior: solo queda visible la ultima.
 */
export class FixedLayoutEngine implements LayoutEngine {
  readonly id = LAYOUT_FIXED_V1;

  plan(params: LayoutPlanParams): CardLayout {
    const { recordCount, config } = params;
    const slots = Array.from({ length: recordCount }, () => fixedSlot(config, 0));
    return { pageSize: config.pageSize, slots, totalPages: 1, engineId: this.id };
  }
}

export class PagePerRecordLayoutEngine implements LayoutEngine {
  readonly id = LAYOUT_PAGE_PER_RECORD_V1;

  plan(params: LayoutPlanParams): CardLayout {
    const { recordCount, config } = params;
    const slots = Array.from({ length: recordCount }, (_, i) => fixedSlot(config, i));
    return { pageSize: config.pageSize, slots, totalPages: Math.max(1, recordCount), engineId: this.id };
  }
}

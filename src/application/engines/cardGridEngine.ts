import { LAYOUT_CARD_GRID_V1, mmToPt } from "../../domain/models";
import type { CardLayout, CardSlot, FrontSlot, Rgb255 } from "../../domain/models";
import { CardGridSpec, planCardGrid } from "../services/gridPlanner";
import { GridCell, paginateByRows } from "../services/paginator";
import type { LayoutEngine, LayoutPlanParams } from "./index";

// Tarjeta de visita 90x50 mm, dos columnas, filas cada 51 mm + 1 mm de separacion
export const BUSINESS_CARD_GRID: CardGridSpec = {
  cardWmm: 90,
  cardHmm: 50,
  columnsXmm: [15, 106],
  firstRowYmm: 240,
  rowStepMm: 52,
};

const TEXT_MARGIN_MM = 5;
const NAME_OFFSET_FROM_TOP = 50;
const CAPTION_SIZE = 8;
const FRONT_TITLE_DROP = 12; // baseline un poco debajo del centro
const FRONT_EXTRA_SIZE = 10;
export const FRONT_TEXT_COLOR: Rgb255 = [57, 171, 226];

function frontSlot(cell: GridCell): FrontSlot {
  const { x, y, width, height } = cell;
  const margin = mmToPt(TEXT_MARGIN_MM);

  return {
    pageIndex: cell.pageIndex * 2,
    frame: { x, y, width, height },
    title: {
      x: x + width / 2,
      y: y + height / 2 - FRONT_TITLE_DROP,
      size: height / 3,
      align: "center",
      maxWidth: width - 4 * margin,
      color: FRONT_TEXT_COLOR,
    },
    extra: {
      x: x + width - margin,
      y: y + margin,
      size: FRONT_EXTRA_SIZE,
      align: "right",
      maxWidth: width - 2 * margin,
      color: FRONT_TEXT_COLOR,
    },
  };
}

function cardSlot(cell: GridCell): CardSlot {
  const { x, y, width, height } = cell;
  const centerX = x + width / 2;

  return {
    pageIndex: cell.pageIndex * 2 + 1,
    frame: { x, y, width, height },
    name: {
      x: centerX,
      y: y + height - NAME_OFFSET_FROM_TOP,
      size: height / 3,
      align: "center",
      maxWidth: width - 2 * mmToPt(TEXT_MARGIN_MM),
    },
    barcode: { x: x + 10, y: y + 15, width: width - 20, height: 80, fit: "contain" },
    caption: { x: centerX, y: y + 5, size: CAPTION_SIZE, align: "center" },
  };
}

/**
 * Por cada pliego: una pagina de frentes y a continuacion la de dorsos (codigos de barras),
 * con las columnas espejadas para que coincidan al imprimir doble faz.
 */
export class CardGridLayoutEngine implements LayoutEngine {
  readonly id = LAYOUT_CARD_GRID_V1;

  constructor(private readonly spec: CardGridSpec = BUSINESS_CARD_GRID) {}

  plan(params: LayoutPlanParams): CardLayout {
    const { recordCount, config } = params;
    const grid = planCardGrid(config.pageSize, this.spec);
    const fronts = paginateByRows({ grid, count: recordCount });
    const backs = paginateByRows({ grid, count: recordCount, mirrorColumns: true });

    return {
      pageSize: config.pageSize,
      fronts: fronts.cells.map(frontSlot),
      slots: backs.cells.map(cardSlot),
      totalPages: fronts.totalPages * 2,
      engineId: this.id,
    };
  }
}

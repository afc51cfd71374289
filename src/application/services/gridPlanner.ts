import { InvalidConfigError } from "../../domain/errors";
import type { Mm, PageSize, Pt } from "../../domain/models";
import { mmToPt } from "../../domain/models";

export interface CardGridSpec {
  cardWmm: Mm;
  cardHmm: Mm;
  columnsXmm: Mm[]; // borde izquierdo de cada columna
  firstRowYmm: Mm; // borde inferior de la primera fila
  rowStepMm: Mm;
}

export interface CardGrid {
  cardW: Pt;
  cardH: Pt;
  columnsX: Pt[];
  rowsY: Pt[]; // de arriba hacia abajo
  capacityPerPage: number;
}

export function planCardGrid(page: PageSize, spec: CardGridSpec): CardGrid {
  const cardW = mmToPt(spec.cardWmm);
  const cardH = mmToPt(spec.cardHmm);
  const step = mmToPt(spec.rowStepMm);

  if (cardW <= 0 || cardH <= 0 || step <= 0) throw new InvalidConfigError("La tarjeta y el paso deben ser > 0.");

  const columnsX = spec.columnsXmm.map(mmToPt).filter((x) => x + cardW <= page.widthPt);

  // y crece hacia arriba; filas mientras la tarjeta no se salga por abajo
  const rowsY: Pt[] = [];
  for (let y = mmToPt(spec.firstRowYmm); y >= 0; y -= step) {
    if (y + cardH <= page.heightPt) rowsY.push(y);
  }

  if (columnsX.length === 0 || rowsY.length === 0) {
    throw new InvalidConfigError("La tarjeta no entra en la pagina configurada.");
  }

  return { cardW, cardH, columnsX, rowsY, capacityPerPage: columnsX.length * rowsY.length };
}

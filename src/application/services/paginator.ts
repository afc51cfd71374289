import type { Box } from "../../domain/models";
import type { CardGrid } from "./gridPlanner";

export interface GridCell extends Box {
  pageIndex: number; // indice de pliego
}

export function paginateByRows(params: { grid: CardGrid; count: number; mirrorColumns?: boolean }): {
  cells: GridCell[];
  totalPages: number;
} {
  const { grid, count } = params;
  const cols = grid.columnsX.length;

  const cells: GridCell[] = [];
  for (let i = 0; i < count; i++) {
    const idxOnPage = i % grid.capacityPerPage;
    const r = Math.floor(idxOnPage / cols);
    const c = idxOnPage % cols;

    // dorso para impresion doble faz: las columnas se espejan
    const col = params.mirrorColumns ? cols - 1 - c : c;

    cells.push({
      pageIndex: Math.floor(i / grid.capacityPerPage),
      x: grid.columnsX[col],
      y: grid.rowsY[r],
      width: grid.cardW,
      height: grid.cardH,
    });
  }

  const totalPages = Math.max(1, Math.ceil(count / grid.capacityPerPage));
  return { cells, totalPages };
}

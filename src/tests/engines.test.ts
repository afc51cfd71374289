import test from "node:test";
import assert from "node:assert/strict";

import { resolveEngine } from "../application/engines";
import { CardGridLayoutEngine, FRONT_TEXT_COLOR } from "../application/engines/cardGridEngine";
import { FixedLayoutEngine, PagePerRecordLayoutEngine } from "../application/engines/fixedEngine";
import { DEFAULT_ENGINES } from "../application/usecases/generateCards";
import { InvalidConfigError } from "../domain/errors";
import {
  LAYOUT_CARD_GRID_V1,
  LAYOUT_FIXED_V1,
  LAYOUT_PAGE_PER_RECORD_V1,
  createCardJobConfig,
  defaultCardJobConfig,
  mmToPt,
} from "../domain/models";

test("Selecciona motor por layoutVersion", () => {
  assert.equal(resolveEngine(LAYOUT_FIXED_V1, DEFAULT_ENGINES).id, LAYOUT_FIXED_V1);
  assert.equal(resolveEngine(LAYOUT_PAGE_PER_RECORD_V1, DEFAULT_ENGINES).id, LAYOUT_PAGE_PER_RECORD_V1);
  assert.equal(resolveEngine(LAYOUT_CARD_GRID_V1, DEFAULT_ENGINES).id, LAYOUT_CARD_GRID_V1);
  assert.equal(defaultCardJobConfig().layoutVersion, LAYOUT_FIXED_V1);
});

test("Falla si layoutVersion no esta registrado", () => {
  assert.throws(
    () => resolveEngine("no-existe", DEFAULT_ENGINES),
    (err: unknown) => err instanceof InvalidConfigError && err.message.includes("no-existe")
  );
});

test("Layout fijo: una pagina y las mismas coordenadas para todos", () => {
  const config = defaultCardJobConfig();
  const layout = new FixedLayoutEngine().plan({ recordCount: 3, config });

  assert.equal(layout.totalPages, 1);
  assert.equal(layout.slots.length, 3);
  for (const slot of layout.slots) {
    assert.deepEqual(slot, {
      pageIndex: 0,
      name: { x: 50, y: 750, size: 24, align: "left" },
      barcode: { x: 50, y: 700, width: 100, height: 50, fit: "stretch" },
    });
  }
});

test("Layout fijo sin registros: una pagina vacia", () => {
  const layout = new FixedLayoutEngine().plan({ recordCount: 0, config: defaultCardJobConfig() });
  assert.equal(layout.totalPages, 1);
  assert.deepEqual(layout.slots, []);
});

test("Layout fijo usa la configuracion recibida", () => {
  const config = createCardJobConfig({
    textPosition: { x: 10, y: 20 },
    textSize: 12,
    imageBox: { x: 30, y: 40, width: 200, height: 60 },
  });
  const [slot] = new FixedLayoutEngine().plan({ recordCount: 1, config }).slots;
  assert.deepEqual(slot.name, { x: 10, y: 20, size: 12, align: "left" });
  assert.deepEqual(slot.barcode, { x: 30, y: 40, width: 200, height: 60, fit: "stretch" });
});

test("Una pagina por registro", () => {
  const layout = new PagePerRecordLayoutEngine().plan({ recordCount: 3, config: defaultCardJobConfig() });
  assert.equal(layout.totalPages, 3);
  assert.deepEqual(
    layout.slots.map((s) => s.pageIndex),
    [0, 1, 2]
  );
});

test("Grilla de tarjetas: frentes y dorsos por pliego, 2 columnas x 5 filas en A4", () => {
  const config = createCardJobConfig({ layoutVersion: LAYOUT_CARD_GRID_V1 });
  const layout = new CardGridLayoutEngine().plan({ recordCount: 11, config });

  // 2 pliegos -> frente, dorso, frente, dorso
  assert.equal(layout.totalPages, 4);
  assert.equal(layout.slots.length, 11);
  assert.equal(layout.fronts?.length, 11);

  const cardW = mmToPt(90);
  const cardH = mmToPt(50);
  const left = mmToPt(15);
  const right = mmToPt(106);
  const top = mmToPt(240);

  // dorsos: columnas espejadas respecto de los frentes
  const [first, second, third] = layout.slots;
  assert.deepEqual(first.frame, { x: right, y: top, width: cardW, height: cardH });
  assert.deepEqual(second.frame, { x: left, y: top, width: cardW, height: cardH });
  assert.deepEqual(third.frame, { x: right, y: top - mmToPt(52), width: cardW, height: cardH });

  assert.deepEqual(first.name, {
    x: right + cardW / 2,
    y: top + cardH - 50,
    size: cardH / 3,
    align: "center",
    maxWidth: cardW - 2 * mmToPt(5),
  });
  assert.deepEqual(first.barcode, { x: right + 10, y: top + 15, width: cardW - 20, height: 80, fit: "contain" });
  assert.deepEqual(first.caption, { x: right + cardW / 2, y: top + 5, size: 8, align: "center" });

  assert.deepEqual(
    layout.slots.map((s) => s.pageIndex),
    [1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 3]
  );
  assert.deepEqual(layout.slots[10].frame, first.frame);
});

test("Grilla de tarjetas: frente con segunda palabra centrada e info abajo a la derecha", () => {
  const config = createCardJobConfig({ layoutVersion: LAYOUT_CARD_GRID_V1 });
  const layout = new CardGridLayoutEngine().plan({ recordCount: 11, config });
  const fronts = layout.fronts ?? [];

  const cardW = mmToPt(90);
  const cardH = mmToPt(50);
  const left = mmToPt(15);
  const right = mmToPt(106);
  const top = mmToPt(240);
  const margin = mmToPt(5);

  const [first, second] = fronts;
  assert.deepEqual(first.frame, { x: left, y: top, width: cardW, height: cardH });
  assert.deepEqual(second.frame, { x: right, y: top, width: cardW, height: cardH });

  assert.deepEqual(first.title, {
    x: left + cardW / 2,
    y: top + cardH / 2 - 12,
    size: cardH / 3,
    align: "center",
    maxWidth: cardW - 4 * margin,
    color: FRONT_TEXT_COLOR,
  });
  assert.deepEqual(first.extra, {
    x: left + cardW - margin,
    y: top + margin,
    size: 10,
    align: "right",
    maxWidth: cardW - 2 * margin,
    color: FRONT_TEXT_COLOR,
  });
  assert.deepEqual(FRONT_TEXT_COLOR, [57, 171, 226]);

  assert.deepEqual(
    fronts.map((f) => f.pageIndex),
    [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 2]
  );
});

test("Layout fijo no tiene frentes", () => {
  const layout = new FixedLayoutEngine().plan({ recordCount: 2, config: defaultCardJobConfig() });
  assert.equal(layout.fronts, undefined);
});

test("Grilla rechaza una pagina donde no entra ninguna tarjeta", () => {
  const config = createCardJobConfig({ pageSize: { widthPt: 100, heightPt: 100 } });
  assert.throws(() => new CardGridLayoutEngine().plan({ recordCount: 1, config }), InvalidConfigError);
});

test("Configuracion invalida", () => {
  assert.throws(() => createCardJobConfig({ textSize: 0 }), InvalidConfigError);
  assert.throws(() => createCardJobConfig({ pageSize: { widthPt: 0, heightPt: 10 } }), InvalidConfigError);
  assert.throws(() => createCardJobConfig({ imageBox: { x: 0, y: 0, width: -1, height: 10 } }), InvalidConfigError);
  assert.throws(() => createCardJobConfig({ delimiter: "" }), InvalidConfigError);
});

import { access, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import fontkit from "@pdf-lib/fontkit";
import { PDFDocument, PDFFont, PDFImage, PDFPage, rgb } from "pdf-lib";
import sharp from "sharp";
import type { AssembleParams, BarcodeEncoder, CardAssemblerPort, Logger } from "../../application/ports";
import { frontTitle } from "../../application/services/cardText";
import { encodeNumber } from "../../application/services/checkDigit";
import { FontLoadError } from "../../domain/errors";
import type { Box, CardRecord, FontSource, FrontSlot, ImagePlacement, TextPlacement } from "../../domain/models";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function embedConfiguredFont(doc: PDFDocument, source: FontSource): Promise<PDFFont> {
  if (source.kind === "standard") {
    try {
      return await doc.embedFont(source.name);
    } catch (err) {
      throw new FontLoadError(`No se pudo cargar la fuente estandar ${source.name}: ${errorMessage(err)}`, { cause: err });
    }
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(source.path);
  } catch (err) {
    throw new FontLoadError(`No se pudo leer la fuente: ${source.path}`, { cause: err });
  }

  doc.registerFontkit(fontkit);
  try {
    return await doc.embedFont(bytes);
  } catch (err) {
    throw new FontLoadError(`Fuente invalida ${source.path}: ${errorMessage(err)}`, { cause: err });
  }
}

function fitTextSize(font: PDFFont, text: string, placement: TextPlacement): number {
  const { maxWidth } = placement;
  if (maxWidth === undefined) return placement.size;

  let size = placement.size;
  while (size > 1 && font.widthOfTextAtSize(text, size) > maxWidth) size -= 1;
  return size;
}

export function alignedX(placement: TextPlacement, textWidth: number): number {
  if (placement.align === "center") return placement.x - textWidth / 2;
  if (placement.align === "right") return placement.x - textWidth;
  return placement.x;
}

function drawLabel(page: PDFPage, font: PDFFont, text: string, placement: TextPlacement): void {
  const size = fitTextSize(font, text, placement);
  const x = alignedX(placement, font.widthOfTextAtSize(text, size));
  const [r, g, b] = placement.color ?? [0, 0, 0];
  page.drawText(text, { x, y: placement.y, size, font, color: rgb(r / 255, g / 255, b / 255) });
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Template PNG del frente; si no esta en disco se dibuja solo el marco. */
async function embedTemplate(doc: PDFDocument, templatePath: string): Promise<PDFImage | undefined> {
  if (!(await fileExists(templatePath))) return undefined;
  const pngBytes = await sharp(templatePath).png().toBuffer();
  return doc.embedPng(pngBytes);
}

function imageBox(placement: ImagePlacement, widthPx: number, heightPx: number): Box {
  if (placement.fit === "stretch") return placement;

  // contain: respeta el ratio y centra dentro de la caja
  const scale = Math.min(placement.width / widthPx, placement.height / heightPx);
  const width = widthPx * scale;
  const height = heightPx * scale;
  return {
    x: placement.x + (placement.width - width) / 2,
    y: placement.y + (placement.height - height) / 2,
    width,
    height,
  };
}

const drawBoxLines = (page: PDFPage, box: Box) => {
  const { x, y, width: w, height: h } = box;
  // 4 lineas = marco, sin riesgo de fill negro
  page.drawLine({ start: { x, y }, end: { x: x + w, y } });
  page.drawLine({ start: { x, y }, end: { x, y: y + h } });
  page.drawLine({ start: { x: x + w, y }, end: { x: x + w, y: y + h } });
  page.drawLine({ start: { x, y: y + h }, end: { x: x + w, y: y + h } });
};

function drawFront(
  page: PDFPage,
  font: PDFFont,
  template: PDFImage | undefined,
  record: CardRecord,
  slot: FrontSlot
): void {
  if (template) page.drawImage(template, slot.frame);
  else drawBoxLines(page, slot.frame);

  drawLabel(page, font, frontTitle(record.name), slot.title);
  if (record.extraInfo) drawLabel(page, font, record.extraInfo, slot.extra);
}

export interface PdfLibCardAssemblerOptions {
  logger?: Logger;
  debug?: boolean;
}

export class PdfLibCardAssembler implements CardAssemblerPort {
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(private readonly encoder: BarcodeEncoder, options: PdfLibCardAssemblerOptions = {}) {
    this.logger = options.logger ?? console;
    this.debug = options.debug ?? false;
  }

  async assemble(params: AssembleParams): Promise<PDFDocument> {
    const { records, layout, config } = params;

    const doc = await PDFDocument.create();

    // la fuente se carga antes de crear paginas o dibujar nada
    const font = await embedConfiguredFont(doc, config.font);

    const { widthPt, heightPt } = layout.pageSize;
    const pages = Array.from({ length: layout.totalPages }, () => doc.addPage([widthPt, heightPt]));
    const template = layout.fronts ? await embedTemplate(doc, config.templatePath) : undefined;

    // secuencial: el PNG temporal depende del numero y se borra antes del siguiente registro
    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      const slot = layout.slots[i];
      const page = slot ? pages[slot.pageIndex] : undefined;
      if (!slot || !page) throw new Error(`Sin ubicacion en el layout para el registro ${i}.`);

      const encoded = encodeNumber(record.number);
      const tempPath = join(config.tempDir, `barcode_${record.number}.png`);
      if (this.debug) this.logger.log(`[${i}] ${record.name}: ${record.number} -> ${encoded}`);

      const front = layout.fronts?.[i];
      if (front) {
        const frontPage = pages[front.pageIndex];
        if (!frontPage) throw new Error(`Sin pagina de frente para el registro ${i}.`);
        drawFront(frontPage, font, template, record, front);
      }

      try {
        const image = await this.encoder.render(encoded, tempPath);
        if (this.debug) this.logger.log(`[${i}] PNG temporal: ${tempPath} (${image.widthPx}x${image.heightPx}px)`);

        drawLabel(page, font, record.name, slot.name);

        // Normalizamos PNG (evita paleta/indexado raro)
        const pngBytes = await sharp(image.filePath).png().toBuffer();
        const embedded = await doc.embedPng(pngBytes);
        page.drawImage(embedded, imageBox(slot.barcode, image.widthPx, image.heightPx));

        if (slot.frame) drawBoxLines(page, slot.frame);
        if (slot.caption) drawLabel(page, font, record.number, slot.caption);
      } finally {
        await rm(tempPath, { force: true });
        if (this.debug) this.logger.log(`[${i}] PNG temporal borrado: ${tempPath}`);
      }
    }

    return doc;
  }
}

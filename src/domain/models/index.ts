import { InvalidConfigError } from "../errors";

export type Pt = number;
export type Mm = number;

export interface CardRecord {
  readonly name: string;
  readonly number: string; // solo digitos
  readonly extraInfo: string;
}

export interface PageSize {
  widthPt: Pt;
  heightPt: Pt;
}

export interface Point {
  x: Pt;
  y: Pt;
}

export interface Box {
  x: Pt; // esquina inferior izquierda
  y: Pt;
  width: Pt;
  height: Pt;
}

export type StandardFontName =
  | "Helvetica"
  | "Helvetica-Bold"
  | "Times-Roman"
  | "Times-Bold"
  | "Courier"
  | "Courier-Bold";

export type FontSource = { kind: "file"; path: string } | { kind: "standard"; name: StandardFontName };

export interface BarcodeOptions {
  scale: number;
  heightMm: Mm;
}

export interface CardJobConfig {
  inputPath: string;
  outputPath: string;
  font: FontSource;
  tempDir: string;
  delimiter: string;
  pageSize: PageSize;
  textPosition: Point;
  textSize: Pt;
  imageBox: Box;
  layoutVersion: string;
  compress: boolean;
  barcode: BarcodeOptions;
  templatePath: string; // PNG de fondo para el frente (card-grid-v1); opcional en disco
}

export const LAYOUT_FIXED_V1 = "fixed-v1";
export const LAYOUT_PAGE_PER_RECORD_V1 = "page-per-record-v1";
export const LAYOUT_CARD_GRID_V1 = "card-grid-v1";
export const DEFAULT_LAYOUT_VERSION = LAYOUT_FIXED_V1;

export const A4: PageSize = { widthPt: 595.276, heightPt: 841.89 };

export function mmToPt(mm: Mm): Pt {
  return (mm * 72) / 25.4;
}

export function defaultCardJobConfig(): CardJobConfig {
  return {
    inputPath: "data/name and numbers.csv",
    outputPath: "cards.pdf",
    font: { kind: "file", path: "data/font.ttf" },
    tempDir: ".",
    delimiter: ",",
    pageSize: { ...A4 },
    textPosition: { x: 50, y: 750 },
    textSize: 24,
    imageBox: { x: 50, y: 700, width: 100, height: 50 },
    layoutVersion: DEFAULT_LAYOUT_VERSION,
    compress: true,
    barcode: { scale: 3, heightMm: 10 },
    templatePath: "data/vcard.face.png",
  };
}

export function createCardJobConfig(overrides: Partial<CardJobConfig> = {}): CardJobConfig {
  const config: CardJobConfig = { ...defaultCardJobConfig(), ...overrides };

  if (config.pageSize.widthPt <= 0 || config.pageSize.heightPt <= 0) {
    throw new InvalidConfigError("La pagina debe ser > 0.");
  }
  if (config.textSize <= 0) throw new InvalidConfigError("textSize debe ser > 0.");
  if (config.imageBox.width <= 0 || config.imageBox.height <= 0) {
    throw new InvalidConfigError("imageBox debe tener ancho/alto > 0.");
  }
  if (config.barcode.scale <= 0 || config.barcode.heightMm <= 0) {
    throw new InvalidConfigError("barcode.scale y barcode.heightMm deben ser > 0.");
  }
  if (config.delimiter.length === 0) throw new InvalidConfigError("El delimitador no puede ser vacio.");

  return config;
}

export type Rgb255 = [number, number, number];

export interface TextPlacement extends Point {
  size: Pt;
  align: "left" | "center" | "right"; // x es el borde izquierdo, el centro o el borde derecho
  maxWidth?: Pt; // achica la fuente hasta que entre
  color?: Rgb255; // default negro
}

export interface ImagePlacement extends Box {
  fit: "stretch" | "contain";
}

export interface CardSlot {
  pageIndex: number; // 0-based
  name: TextPlacement;
  barcode: ImagePlacement;
  frame?: Box;
  caption?: TextPlacement; // numero impreso bajo el codigo
}

/** Frente de la tarjeta: segunda palabra del nombre + info adicional. */
export interface FrontSlot {
  pageIndex: number;
  frame: Box; // tambien la caja del template, si existe
  title: TextPlacement;
  extra: TextPlacement;
}

export interface CardLayout {
  pageSize: PageSize;
  slots: CardSlot[];
  fronts?: FrontSlot[]; // mismo orden que slots
  totalPages: number;
  engineId: string;
}

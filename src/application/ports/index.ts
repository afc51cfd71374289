import type { PDFDocument } from "pdf-lib";
import type { CardJobConfig, CardLayout, CardRecord } from "../../domain/models";

// ===== Lectura de registros (CSV, etc.) =====
export interface RecordReaderPort {
  read(path: string): Promise<CardRecord[]>;
}

// ===== Codigo de barras (bwip-js, etc.) =====
export interface BarcodeImageInfo {
  filePath: string; // PNG temporal
  widthPx: number;
  heightPx: number;
}

export interface BarcodeEncoder {
  render(encodedNumber: string, filePath: string): Promise<BarcodeImageInfo>;
}

// ===== Armado del documento (pdf-lib) =====
export interface AssembleParams {
  records: CardRecord[];
  layout: CardLayout;
  config: CardJobConfig;
}

export interface CardAssemblerPort {
  assemble(params: AssembleParams): Promise<PDFDocument>;
}

// ===== Escritura del documento =====
export interface DocumentSink {
  write(params: { doc: PDFDocument; outputPath: string; compress: boolean }): Promise<void>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

import { writeFile } from "node:fs/promises";
import type { PDFDocument } from "pdf-lib";
import type { DocumentSink } from "../../application/ports";
import { DocumentWriteError } from "../../domain/errors";

export class PdfFileSink implements DocumentSink {
  async write(params: { doc: PDFDocument; outputPath: string; compress: boolean }): Promise<void> {
    const { doc, outputPath, compress } = params;

    try {
      const pdfBytes = await doc.save({ useObjectStreams: compress });
      await writeFile(outputPath, pdfBytes);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DocumentWriteError(`No se pudo escribir el PDF en ${outputPath}: ${reason}`, { cause: err });
    }
  }
}

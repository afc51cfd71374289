import { resolve } from "node:path";

import type { BarcodeEncoder, Logger } from "../../application/ports";
import { generateCards } from "../../application/usecases/generateCards";
import { InvalidConfigError } from "../../domain/errors";
import { CardJobConfig, createCardJobConfig } from "../../domain/models";
import { BwipBarcodeEncoder } from "../barcode/bwipBarcodeEncoder";
import { CsvRecordReader } from "../persistence/csvRecordReader";
import { PdfFileSink } from "../renderer/pdfFileSink";
import { PdfLibCardAssembler } from "../renderer/pdfLibRenderer";

export interface CliFlags {
  debug: boolean;
  layoutVersion?: string;
}

export interface CliOptions {
  overrides?: Partial<CardJobConfig>;
  logger?: Logger;
  encoder?: BarcodeEncoder;
}

export function parseFlags(argv: string[]): CliFlags {
  const flags: CliFlags = { debug: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--debug" || arg === "-debug") {
      flags.debug = true;
      continue;
    }
    if (arg === "--layout") {
      const value = argv[i + 1];
      if (!value) throw new InvalidConfigError("Falta el valor de --layout.");
      flags.layoutVersion = value;
      i++;
      continue;
    }
    throw new InvalidConfigError(`Opcion invalida: ${arg}`);
  }

  return flags;
}

export async function runCli(
  argv: string[],
  options: CliOptions = {}
): Promise<void> {
  const logger = options.logger ?? console;
  const flags = parseFlags(argv);

  const config = createCardJobConfig({
    ...options.overrides,
    ...(flags.layoutVersion ? { layoutVersion: flags.layoutVersion } : {}),
  });

  if (flags.debug) logger.log("Modo debug activado");

  const encoder = options.encoder ?? new BwipBarcodeEncoder(config.barcode);
  const result = await generateCards({
    config,
    reader: new CsvRecordReader(config.delimiter),
    assembler: new PdfLibCardAssembler(encoder, { logger, debug: flags.debug }),
    sink: new PdfFileSink(),
    logger,
  });

  logger.log("\n=== RESUMEN ===");
  logger.log(`Layout: ${result.engineId}`);
  logger.log(`Tarjetas: ${result.records.length}`);
  logger.log(`Paginas: ${result.totalPages}`);
  logger.log(`\nPDF generado correctamente:\n${resolve(result.outputPath)}`);
}

/** Corre el CLI y devuelve el exit code: 0 ok, 1 ante cualquier error. */
export async function main(
  argv: string[] = process.argv.slice(2),
  options: CliOptions = {}
): Promise<number> {
  const logger = options.logger ?? console;
  try {
    await runCli(argv, options);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Error: ${message}`);
    if (argv.includes("--debug") || argv.includes("-debug")) {
      if (err instanceof Error && err.stack) logger.error(err.stack);
    }
    return 1;
  }
}

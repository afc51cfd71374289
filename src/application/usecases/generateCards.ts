import type { CardJobConfig, CardRecord } from "../../domain/models";
import type { CardAssemblerPort, DocumentSink, Logger, RecordReaderPort } from "../ports";
import { LayoutEngine, resolveEngine } from "../engines";
import { CardGridLayoutEngine } from "../engines/cardGridEngine";
import { FixedLayoutEngine, PagePerRecordLayoutEngine } from "../engines/fixedEngine";

export interface GenerateCardsParams {
  config: CardJobConfig;
  reader: RecordReaderPort;
  assembler: CardAssemblerPort;
  sink: DocumentSink;
  engines?: LayoutEngine[];
  logger?: Logger;
}

export interface GenerateCardsResult {
  records: CardRecord[];
  engineId: string;
  totalPages: number;
  outputPath: string;
}

export const DEFAULT_ENGINES: LayoutEngine[] = [
  new FixedLayoutEngine(),
  new PagePerRecordLayoutEngine(),
  new CardGridLayoutEngine(),
];

export async function generateCards(params: GenerateCardsParams): Promise<GenerateCardsResult> {
  const { config, reader, assembler, sink } = params;
  const logger = params.logger ?? console;

  const engine = resolveEngine(config.layoutVersion, params.engines ?? DEFAULT_ENGINES);
  const records = await reader.read(config.inputPath);

  logger.log("\nCreando tarjetas para:");
  records.forEach((r) => logger.log(`- ${r.name}: ${r.number}`));
  if (records.length === 0) logger.warn("Advertencia: el CSV no tiene registros; el PDF sale con una pagina vacia.");

  const layout = engine.plan({ recordCount: records.length, config });

  // el PDF se escribe recien cuando todas las tarjetas se armaron bien
  const doc = await assembler.assemble({ records, layout, config });
  await sink.write({ doc, outputPath: config.outputPath, compress: config.compress });

  return { records, engineId: engine.id, totalPages: layout.totalPages, outputPath: config.outputPath };
}

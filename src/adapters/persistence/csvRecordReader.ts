import { readFile } from "node:fs/promises";
import type { RecordReaderPort } from "../../application/ports";
import { FileNotFoundError } from "../../domain/errors";
import type { CardRecord } from "../../domain/models";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function parseRecordLine(line: string, delimiter: string): CardRecord {
  // sin comillas ni escapes: un delimitador dentro de un campo desalinea la fila
  const [name = "", number = "", extraInfo = ""] = line.split(delimiter);
  return { name: name.trim(), number: number.trim(), extraInfo: extraInfo.trim() };
}

export async function readCardRecords(csvPath: string, delimiter = ","): Promise<CardRecord[]> {
  let raw: string;
  try {
    raw = await readFile(csvPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) throw new FileNotFoundError(csvPath, { cause: err });
    throw err;
  }

  // 1) La primera linea es el header: se descarta sin validar
  const lines = raw.split(/\r?\n/).slice(1);

  // 2) Lineas vacias y comentarios (#) no generan registro
  const records: CardRecord[] = [];
  for (const line of lines) {
    if (!line.trim()) continue;

    const record = parseRecordLine(line, delimiter);
    if (record.name.startsWith("#")) continue;

    records.push(record);
  }

  return records;
}

export class CsvRecordReader implements RecordReaderPort {
  constructor(private readonly delimiter = ",") {}

  async read(csvPath: string): Promise<CardRecord[]> {
    return readCardRecords(csvPath, this.delimiter);
  }
}

import { writeFile } from "node:fs/promises";
import { toBuffer } from "bwip-js";
import sharp from "sharp";
import type { BarcodeEncoder, BarcodeImageInfo } from "../../application/ports";
import { BarcodeEncodeError } from "../../domain/errors";
import type { BarcodeOptions } from "../../domain/models";

const EAN13_PAYLOAD = /^[0-9]{13}$/;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** EAN-13 sin texto legible, fondo blanco. */
export class BwipBarcodeEncoder implements BarcodeEncoder {
  constructor(private readonly options: BarcodeOptions = { scale: 3, heightMm: 10 }) {}

  async render(encodedNumber: string, filePath: string): Promise<BarcodeImageInfo> {
    // con 12 digitos bwip-js agrega su propio digito de control: se exige el codigo completo
    if (!EAN13_PAYLOAD.test(encodedNumber)) {
      throw new BarcodeEncodeError(
        `No se pudo codificar "${encodedNumber}" como EAN-13: se esperan 13 digitos (12 + control), hay ${encodedNumber.length}.`
      );
    }

    let png: Buffer;
    try {
      png = await toBuffer({
        bcid: "ean13",
        text: encodedNumber,
        scale: this.options.scale,
        height: this.options.heightMm,
        includetext: false,
        backgroundcolor: "FFFFFF",
      });
    } catch (err) {
      throw new BarcodeEncodeError(`No se pudo codificar "${encodedNumber}" como EAN-13: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    await writeFile(filePath, png);

    const meta = await sharp(png).metadata();
    if (!meta.width || !meta.height) throw new BarcodeEncodeError(`No pude leer width/height de: ${filePath}`);

    return { filePath, widthPx: meta.width, heightPx: meta.height };
  }
}

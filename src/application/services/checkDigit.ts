import { InvalidNumberFormatError } from "../../domain/errors";

const DIGITS_ONLY = /^[0-9]+$/;

function assertDigits(number: string): void {
  if (!DIGITS_ONLY.test(number)) throw new InvalidNumberFormatError(number);
}

/**
 * Digito de control mod-10 con pesos 1/3.
 *
 * Las posiciones se cuentan desde la izquierda (0-based): pares suman x1, impares x3.
 * Para numeros de 12 digitos coincide con EAN-13; para otros largos no.
 */
export function computeCheckDigit(number: string): number {
  assertDigits(number);

  let sumEven = 0;
  let sumOdd = 0;
  for (let i = 0; i < number.length; i++) {
    const digit = number.charCodeAt(i) - 48;
    if (i % 2 === 0) sumEven += digit;
    else sumOdd += digit;
  }

  return (10 - ((sumEven + 3 * sumOdd) % 10)) % 10;
}

export function encodeNumber(number: string): string {
  return `${number}${computeCheckDigit(number)}`;
}

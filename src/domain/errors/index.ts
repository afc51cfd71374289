export class DomainError extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options);
    // Fix para herencia correcta en TS/Node
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

export class FileNotFoundError extends DomainError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Archivo no encontrado: ${path}`, options);
  }
}

export class FontLoadError extends DomainError {
  constructor(message = "No se pudo cargar la fuente.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class BarcodeEncodeError extends DomainError {
  constructor(message = "No se pudo generar el codigo de barras.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Numero con caracteres no numericos (o vacio): no se puede codificar. */
export class InvalidNumberFormatError extends BarcodeEncodeError {
  constructor(public readonly value: string) {
    super(`Numero invalido "${value}": solo se admiten digitos 0-9.`);
  }
}

export class DocumentWriteError extends DomainError {
  constructor(message = "No se pudo escribir el PDF.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidConfigError extends DomainError {
  constructor(message = "Configuracion invalida.") {
    super(message);
  }
}

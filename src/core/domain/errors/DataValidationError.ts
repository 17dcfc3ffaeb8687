// src/core/domain/errors/DataValidationError.ts

/**
 * Único error de validación visible para quien llama:
 * payload mal formado, campo faltante o con tipo incorrecto,
 * categoría desconocida y precondiciones de mutación (update sin id).
 */
export class DataValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataValidationError";
    Object.setPrototypeOf(this, DataValidationError.prototype);
  }
}

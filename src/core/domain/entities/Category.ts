// src/core/domain/entities/Category.ts
import { DataValidationError } from "../errors/DataValidationError";

export enum Category {
  UNKNOWN = "UNKNOWN",
  CLOTHS = "CLOTHS",
  FOOD = "FOOD",
  HOUSEWARES = "HOUSEWARES",
  AUTOMOTIVE = "AUTOMOTIVE",
  TOOLS = "TOOLS",
}

export const CATEGORIES: readonly Category[] = Object.values(Category);

const isCategory = (v: string): v is Category =>
  CATEGORIES.some((c) => c === v);

/** Decodifica el nombre exacto del miembro ("FOOD"); cualquier otro valor es inválido. */
export function decodeCategory(name: unknown): Category {
  if (typeof name !== "string" || !isCategory(name)) {
    throw new DataValidationError(`Atributo inválido: categoría desconocida [${String(name)}]`);
  }
  return name;
}

// src/core/domain/schemas/ProductPayloadSchema.ts
import { z } from "zod";
import { DataValidationError } from "../errors/DataValidationError";

/**
 * Forma del payload externo (request body o construcción programática).
 * price y category se validan aquí sólo por tipo; su decodificación
 * (decimal exacto / miembro del enum) la hace la entidad.
 */
export const ProductPayloadSchema = z.object({
  name: z.string().min(1, "name no puede estar vacío"),
  description: z.string().nullish(),
  price: z.union([z.number(), z.string()]),
  available: z.boolean(),
  category: z.string(),
});

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** Traduce el primer issue de zod al error de dominio. */
export function toDataValidationError(
  error: z.ZodError,
  payload: unknown
): DataValidationError {
  const issue = error.issues[0];
  if (!issue || issue.path.length === 0 || !isRecord(payload)) {
    return new DataValidationError(
      "Producto inválido: el cuerpo de la solicitud no trae datos o son incorrectos"
    );
  }

  const field = issue.path.join(".");
  if (payload[String(issue.path[0])] === undefined) {
    return new DataValidationError(`Producto inválido: falta ${field}`);
  }
  if (issue.code === "invalid_type") {
    return new DataValidationError(
      `Tipo inválido para [${field}]: se esperaba ${issue.expected}, llegó ${issue.received}`
    );
  }
  if (issue.code === "invalid_union") {
    return new DataValidationError(
      `Tipo inválido para [${field}]: se esperaba number o string`
    );
  }
  return new DataValidationError(`Producto inválido [${field}]: ${issue.message}`);
}

// src/utils/price.ts
import { DataValidationError } from "../core/domain/errors/DataValidationError";

// NUMERIC(10,2): 8 dígitos enteros + 2 decimales
export const PRICE_SCALE = 2;
export const PRICE_PRECISION = 10;

const DECIMAL_RE = /^([+-]?)(\d+)?(?:\.(\d*))?$/;
const MAX_INT_DIGITS = PRICE_PRECISION - PRICE_SCALE;

export type PriceInput = number | string | Price;

/**
 * Precio decimal exacto. Internamente se guarda en centavos (entero),
 * nunca como flotante, para que "19.99" y 19.99 sean el mismo valor.
 */
export class Price {
  private constructor(public readonly cents: number) {}

  /**
   * Acepta número o string decimal ("12.5", " 7 ", "-3.10").
   * Rechaza notación exponencial y más de 2 decimales significativos.
   */
  static parse(input: PriceInput): Price {
    if (input instanceof Price) return input;

    let text: string;
    if (typeof input === "number") {
      if (!Number.isFinite(input)) {
        throw new DataValidationError(`Precio inválido: ${input}`);
      }
      // String(n) da la representación decimal más corta (19.99 -> "19.99")
      text = String(input);
    } else if (typeof input === "string") {
      text = input.trim();
    } else {
      throw new DataValidationError(`Tipo inválido para precio: ${typeof input}`);
    }

    const m = DECIMAL_RE.exec(text);
    if (!m || (m[2] === undefined && !m[3])) {
      throw new DataValidationError(`Precio inválido: "${text}"`);
    }
    const [, sign, intRaw = "0", fracRaw = ""] = m;

    const frac = fracRaw.replace(/0+$/, "");
    if (frac.length > PRICE_SCALE) {
      throw new DataValidationError(
        `Precio inválido: "${text}" tiene más de ${PRICE_SCALE} decimales`
      );
    }
    const intDigits = intRaw.replace(/^0+(?=\d)/, "");
    if (intDigits.length > MAX_INT_DIGITS) {
      throw new DataValidationError(
        `Precio inválido: "${text}" excede ${MAX_INT_DIGITS} dígitos enteros`
      );
    }

    const cents =
      Number(intDigits) * 100 + Number(frac.padEnd(PRICE_SCALE, "0"));
    return new Price(sign === "-" && cents !== 0 ? -cents : cents);
  }

  equals(other: PriceInput): boolean {
    return Price.parse(other).cents === this.cents;
  }

  /** Forma canónica con 2 decimales: "19.99", "12.50", "-0.05" */
  toString(): string {
    const abs = Math.abs(this.cents);
    const units = Math.floor(abs / 100);
    const rest = String(abs % 100).padStart(PRICE_SCALE, "0");
    return `${this.cents < 0 ? "-" : ""}${units}.${rest}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Para filtros de búsqueda: tolera espacios y comillas alrededor (' "2.50" '). */
export const parsePriceQuery = (input: PriceInput): Price =>
  typeof input === "string"
    ? Price.parse(input.replace(/^[\s"]+|[\s"]+$/g, ""))
    : Price.parse(input);

/**
 * Numeric helpers for the scorer and the vocabulary loader
 */

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_LITERAL = /^([+-]?)(inf|infinity)$/i;

export class NumberUtils {

    static clamp(value: number, min: number, max: number): number {
        return Math.min(max, Math.max(min, value));
    }

    /**
     * Rounds to `digits` decimals. Exact binary ties go to the even neighbour,
     * anything else to the nearest value, so 0.125 -> 0.12 and 2.675 -> 2.67
     * (2.675 is stored slightly below the tie).
     */
    static roundHalfEven(value: number, digits: number): number {
        if (!Number.isFinite(value)) return value;

        const sign = value < 0 ? -1 : 1;
        const magnitude = Math.abs(value);
        if (magnitude >= 1e21) return value;

        const exact = magnitude.toFixed(100);
        const [intPart = "0", fracPart = ""] = exact.split(".");
        const tail = fracPart.slice(digits);

        if (/^50*$/.test(tail)) {
            const kept = fracPart.slice(0, digits);
            const lastDigit = Number((digits > 0 ? kept : intPart).slice(-1));
            const truncated = Number(digits > 0 ? `${intPart}.${kept}` : intPart);
            if (lastDigit % 2 === 0) return sign * truncated;
            return sign * Number((truncated + Math.pow(10, -digits)).toFixed(digits));
        }

        return sign * Number(magnitude.toFixed(digits));
    }

    /**
     * Numbers pass through, numeric strings (including "inf" and "Infinity")
     * are parsed, everything else (NaN, empty strings, words, null, booleans,
     * objects) yields null.
     */
    static parseNumeric(value: unknown): number | null {
        if (typeof value === "number") {
            return Number.isNaN(value) ? null : value;
        }
        if (typeof value === "string") {
            const trimmed = value.trim();
            const infinity = INFINITY_LITERAL.exec(trimmed);
            if (infinity) return infinity[1] === "-" ? -Infinity : Infinity;
            if (!DECIMAL_LITERAL.test(trimmed)) return null;
            return Number(trimmed);
        }
        return null;
    }
}

// src/core/normalization/normalization.utils.ts
import { CellValue } from '../common/interfaces/models';

const CURRENCY_SYMBOLS = /[€$£¥]/g;
// A dot is a thousands separator only when exactly three digits follow it
// and then a non-digit or the end of the string.
const THOUSANDS_DOT = /\.(?=\d{3}(?:\D|$))/g;
const PLAIN_DECIMAL = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parses a price/quantity cell using Italian and international conventions.
 * - "1.234,56" -> 1234.56, "12,5" -> 12.5, "€ 9,90" -> 9.9
 * - "1.234" -> 1234 (a dot followed by three digits is read as thousands)
 * @returns the number, or null when the cell is empty or not numeric. Never throws.
 */
export function normalizeNumber(raw: unknown): number | null {
    if (raw === null || raw === undefined) return null;
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : null;
    }
    if (typeof raw !== 'string') return null;

    let text = raw.replace(CURRENCY_SYMBOLS, '').replace(/\s+/g, '');
    text = text.replace(THOUSANDS_DOT, '');
    text = text.replace(/,/g, '.');

    if (!PLAIN_DECIMAL.test(text)) return null;
    const value = Number(text);
    return Number.isFinite(value) ? value : null;
}

/**
 * Comparison form of a cell: trimmed text, with null/undefined as "".
 */
export function normalizeText(raw: unknown): string {
    if (raw === null || raw === undefined) return '';
    return String(raw).trim();
}

/**
 * Storage form of a parsed cell. Absent stays null so that "present but empty"
 * and "not supplied" remain distinguishable.
 */
export function normalizeCell(raw: unknown): CellValue {
    if (raw === null || raw === undefined) return null;
    if (typeof raw === 'string') return raw;
    if (raw instanceof Date) {
        return isNaN(raw.getTime()) ? null : raw.toISOString().slice(0, 10);
    }
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? String(raw) : null;
    }
    return String(raw);
}

/**
 * Header form used by the column mapper: lowercase, no diacritics,
 * every run of non-alphanumerics collapsed to one space.
 * "COD." -> "cod", "Q.tà" -> "q ta", "€ Cf" -> "cf"
 */
export function normalizeHeader(raw: unknown): string {
    return String(raw ?? '')
        .toLowerCase()
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^a-z0-9]+/g, ' ')
        .trim();
}

/**
 * Rounds to 2 decimals, half away from zero. Works on the decimal
 * representation so 1.005 -> 1.01 rather than 1.00.
 */
export function roundCurrency(value: number): number {
    if (!Number.isFinite(value)) return value;
    const sign = value < 0 ? -1 : 1;
    const abs = Math.abs(value);
    const repr = String(abs);
    if (repr.includes('e')) {
        // exponent notation (very small or very large): plain scaling is exact enough
        return sign * (Math.round(abs * 100) / 100);
    }
    const rounded = Number(`${Math.round(Number(`${repr}e2`))}e-2`);
    return rounded === 0 ? 0 : sign * rounded;
}

import {
  MalformedExpiryError,
  MalformedStrikeError,
  MalformedSymbolError,
  OptionSymbolError,
} from './errors';
import type { ExpiryInput, OptionType, OptionTypeInput, StrikeInput } from './types';

export type DateOrder = 'YYMMDD' | 'MMDDYY';

const SIX_DIGITS = /^\d{6}$/;
const DECIMAL_PATTERN = /^(\d*)(?:\.(\d*))?$/;
const PLAIN_STRIKE_PATTERN = /^\d+(?:\.\d+)?$/;
const STRIKE_WHOLE_DIGITS = 5;
const STRIKE_FRACTION_DIGITS = 3;

// ============================================================================
// Option side
// ============================================================================

/**
 * `c` and `call` (any case) are calls. Every other value, typos included,
 * is a put.
 */
export function normalizeOptionType(value: OptionTypeInput): OptionType {
  const lowered = value.trim().toLowerCase();
  return lowered === 'c' || lowered === 'call' ? 'CALL' : 'PUT';
}

export function optionTypeCode(type: OptionType): 'C' | 'P' {
  return type === 'CALL' ? 'C' : 'P';
}

export function optionTypeFromCode(code: string, input: string): OptionType {
  switch (code.toUpperCase()) {
    case 'C':
      return 'CALL';
    case 'P':
      return 'PUT';
    default:
      throw new MalformedSymbolError(
        `Expected option side "C" or "P" but found "${code}" in "${input}"`,
        input,
      );
  }
}

// ============================================================================
// Expiry
// ============================================================================

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function resolveReferenceYear(referenceYear?: number): number {
  const year = referenceYear ?? new Date().getUTCFullYear();
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new OptionSymbolError(`referenceYear must be a four-digit year, got ${referenceYear}`);
  }
  return year;
}

/**
 * Renders an expiry as six digits in the given order. Dates are read in UTC;
 * strings are passed through once they are known to be six digits.
 */
export function formatExpiryDigits(expiry: ExpiryInput, order: DateOrder): string {
  if (expiry instanceof Date) {
    if (Number.isNaN(expiry.getTime())) {
      throw new MalformedExpiryError('Expiry date is invalid');
    }
    const yy = pad2(expiry.getUTCFullYear() % 100);
    const mm = pad2(expiry.getUTCMonth() + 1);
    const dd = pad2(expiry.getUTCDate());
    return order === 'YYMMDD' ? `${yy}${mm}${dd}` : `${mm}${dd}${yy}`;
  }

  if (!SIX_DIGITS.test(expiry)) {
    throw new MalformedExpiryError(
      `Expiry string must have 6 digits. Format is: ${order}`,
      expiry,
    );
  }
  return expiry;
}

/**
 * Two-digit years take the century of `referenceYear`: with 2026 as the
 * reference, `21` is 2021 and `99` is 2099.
 */
export function decodeExpiryDigits(
  digits: string,
  order: DateOrder,
  referenceYear: number,
  input: string,
): Date {
  if (!SIX_DIGITS.test(digits)) {
    throw new MalformedExpiryError(`Expiry "${digits}" in "${input}" is not six digits`, input);
  }

  const [yy, mm, dd] =
    order === 'YYMMDD'
      ? [digits.slice(0, 2), digits.slice(2, 4), digits.slice(4, 6)]
      : [digits.slice(4, 6), digits.slice(0, 2), digits.slice(2, 4)];

  const year = Math.floor(referenceYear / 100) * 100 + Number(yy);
  const month = Number(mm);
  const day = Number(dd);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new MalformedExpiryError(`Expiry "${digits}" in "${input}" is not a calendar date`, input);
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

// ============================================================================
// Strike
// ============================================================================

function strikeText(strike: StrikeInput): string {
  if (typeof strike === 'string') {
    return strike.trim();
  }
  if (!Number.isFinite(strike) || strike < 0) {
    throw new MalformedStrikeError(`Strike must be a non-negative finite number, got ${strike}`);
  }
  // String() switches to exponent notation below 1e-6
  return strike > 0 && strike < 1e-6 ? strike.toFixed(STRIKE_FRACTION_DIGITS) : String(strike);
}

/**
 * Fixed-point OCC strike: five whole digits and exactly three fraction
 * digits. Extra fraction digits are cut off, never rounded.
 */
export function encodeStrike(strike: StrikeInput): string {
  const text = strikeText(strike);
  const match = DECIMAL_PATTERN.exec(text);
  if (!match || text === '' || text === '.') {
    throw new MalformedStrikeError(`Strike "${text}" is not a decimal number`, text);
  }

  const whole = (match[1] ?? '').replace(/^0+/, '');
  if (whole.length > STRIKE_WHOLE_DIGITS) {
    throw new MalformedStrikeError(
      `Strike "${text}" has more than ${STRIKE_WHOLE_DIGITS} whole digits`,
      text,
    );
  }
  const fraction = (match[2] ?? '')
    .padEnd(STRIKE_FRACTION_DIGITS, '0')
    .slice(0, STRIKE_FRACTION_DIGITS);

  return `${whole.padStart(STRIKE_WHOLE_DIGITS, '0')}${fraction}`;
}

export function decodeStrike(digits: string): number {
  return Number.parseInt(digits, 10) / 10 ** STRIKE_FRACTION_DIGITS;
}

/** Broker strikes carry no padding: `700`, `72.5`. */
export function formatPlainStrike(strike: StrikeInput): string {
  const raw = strikeText(strike);
  const text = String(Number(raw));
  if (!DECIMAL_PATTERN.test(raw) || raw === '' || raw === '.' || !PLAIN_STRIKE_PATTERN.test(text)) {
    throw new MalformedStrikeError(`Strike "${String(strike)}" is not a plain decimal number`);
  }
  return text;
}

export function parsePlainStrike(text: string): number | undefined {
  return PLAIN_STRIKE_PATTERN.test(text) ? Number(text) : undefined;
}

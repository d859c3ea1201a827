/**
 * Phone number normalization.
 *
 * Maps a raw caller id string to an E.164-style number plus the list of
 * formats a CRM phone field may hold for it. Kenya is the primary market;
 * other countries are tried in table order.
 */

export type CountryName = 'kenya' | 'us' | 'uk';
export type PhoneType = 'mobile' | 'landline' | 'unknown';

export interface NormalizedPhone {
  normalized: string;
  original: string;
  country: CountryName | null;
  valid: boolean;
  type: PhoneType;
  variants: string[];
}

interface CountryPattern {
  type: PhoneType;
  // Group 1 is the optional prefix, group 2 the subscriber number
  pattern: RegExp;
}

interface CountryRule {
  countryCode: string;
  // Digit dialled before the subscriber number for domestic calls
  trunkPrefix: string;
  patterns: CountryPattern[];
}

const COUNTRY_RULES: Record<CountryName, CountryRule> = {
  kenya: {
    countryCode: '254',
    trunkPrefix: '0',
    patterns: [
      // Safaricom / Airtel 7xx and 1xx series
      { type: 'mobile', pattern: /^(\+?254|0)?([17]\d{8})$/ },
      // Telkom landlines 2x-6x
      { type: 'landline', pattern: /^(\+?254|0)?([2-6]\d{7,8})$/ },
    ],
  },
  us: {
    countryCode: '1',
    trunkPrefix: '',
    patterns: [{ type: 'unknown', pattern: /^(\+?1)?([2-9]\d{9})$/ }],
  },
  uk: {
    countryCode: '44',
    trunkPrefix: '0',
    patterns: [{ type: 'unknown', pattern: /^(\+?44|0)?([1-9]\d{8,9})$/ }],
  },
};

const PRIORITY_COUNTRIES: readonly CountryName[] = ['kenya'];

export function isCountryName(value: string): value is CountryName {
  return value in COUNTRY_RULES;
}

/** Keep digits and a single leading "+". */
export function cleanPhoneNumber(raw: string): string {
  const trimmed = raw.trim();
  const digits = trimmed.replace(/[^\d]/g, '');
  if (!digits) return '';
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

function uniq(values: string[]): string[] {
  return values.filter((value, index) => value !== '' && values.indexOf(value) === index);
}

function tryCountry(cleaned: string, original: string, country: CountryName): NormalizedPhone | null {
  const rule = COUNTRY_RULES[country];

  for (const { type, pattern } of rule.patterns) {
    const match = pattern.exec(cleaned);
    if (!match) continue;

    const subscriber = match[2];
    const normalized = `+${rule.countryCode}${subscriber}`;
    return {
      normalized,
      original,
      country,
      valid: true,
      type,
      variants: uniq([
        normalized,
        `${rule.countryCode}${subscriber}`,
        rule.trunkPrefix ? `${rule.trunkPrefix}${subscriber}` : '',
        subscriber,
      ]),
    };
  }

  return null;
}

export class PhoneNormalizer {
  constructor(private readonly defaultCountry: CountryName = 'kenya') {}

  /**
   * Order: explicit hint, configured default, priority list, then every other
   * supported country. Never throws.
   */
  normalize(raw: string | null | undefined, countryHint?: string): NormalizedPhone {
    const original = typeof raw === 'string' ? raw : '';
    if (!original.trim()) {
      return { normalized: '', original: '', country: null, valid: false, type: 'unknown', variants: [] };
    }

    const cleaned = cleanPhoneNumber(original);
    if (cleaned) {
      for (const country of this.candidateCountries(countryHint)) {
        const result = tryCountry(cleaned, original, country);
        if (result) return result;
      }
    }

    return {
      normalized: cleaned || original,
      original,
      country: null,
      valid: false,
      type: 'unknown',
      variants: [original],
    };
  }

  /** Formats to probe the CRM with, in order. */
  searchVariants(raw: string, countryHint?: string): string[] {
    const result = this.normalize(raw, countryHint);
    if (result.valid) return result.variants;

    const cleaned = cleanPhoneNumber(raw);
    return cleaned && cleaned !== raw ? [raw, cleaned] : result.variants;
  }

  private candidateCountries(countryHint?: string): CountryName[] {
    const ordered: CountryName[] = [];
    const hint = countryHint?.trim().toLowerCase();
    if (hint && isCountryName(hint)) ordered.push(hint);
    ordered.push(this.defaultCountry, ...PRIORITY_COUNTRIES);

    const all = Object.keys(COUNTRY_RULES).filter(isCountryName);
    return [...ordered, ...all].filter((country, index, list) => list.indexOf(country) === index);
  }
}

import { LocaleUnavailableWarning } from '@/utils/errors';
import { logger } from '@/utils/logger';

export const DEFAULT_MONTH_LOCALE = 'en-US';

export interface ResolvedLocale {
  locale: string;
  warning?: LocaleUnavailableWarning;
}

export function resolveMonthLocale(requested: string): ResolvedLocale {
  let supported: string[] = [];
  try {
    supported = Intl.DateTimeFormat.supportedLocalesOf([requested]);
  } catch (error) {
    // RangeError for a malformed tag; treated the same as an unsupported one
    logger.debug('Invalid locale tag', { requested, error });
  }
  if (supported.length) {
    return { locale: supported[0] };
  }
  return { locale: DEFAULT_MONTH_LOCALE, warning: new LocaleUnavailableWarning(requested, DEFAULT_MONTH_LOCALE) };
}

/**
 * Full month names, January first, for a locale resolved at startup.
 */
export class MonthNames {
  private readonly names: string[];

  constructor(readonly locale: string) {
    const format = new Intl.DateTimeFormat(locale, { month: 'long', timeZone: 'UTC' });
    this.names = Array.from({ length: 12 }, (_, i) => format.format(new Date(Date.UTC(2000, i, 1))));
  }

  static fromConfig(requested: string): MonthNames {
    const { locale, warning } = resolveMonthLocale(requested);
    if (warning) {
      logger.warn(warning.message, { requested: warning.requested, fallback: warning.fallback });
    }
    return new MonthNames(locale);
  }

  // monthNumber is 1-12
  nameOf(monthNumber: number): string {
    return this.names[monthNumber - 1];
  }

  numberOf(name: string): number {
    return this.names.indexOf(name) + 1; // 0 if not found
  }
}

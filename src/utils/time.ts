const dateFormatters = new Map<string, Intl.DateTimeFormat>();
const timeFormatters = new Map<string, Intl.DateTimeFormat>();

function formatter(cache: Map<string, Intl.DateTimeFormat>, timeZone: string, opts: Intl.DateTimeFormatOptions): Intl.DateTimeFormat {
  let f = cache.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat('en-CA', { timeZone, ...opts });
    cache.set(timeZone, f);
  }
  return f;
}

/** 타임존 기준 YYYY-MM-DD */
export function localDate(ts: number, timeZone: string): string {
  return formatter(dateFormatters, timeZone, { year: 'numeric', month: '2-digit', day: '2-digit' }).format(ts);
}

/** 타임존 기준 HH:mm:ss */
export function localTime(ts: number, timeZone: string): string {
  return formatter(timeFormatters, timeZone, {
    hour: '2-digit', minute: '2-digit', second: '2-digit', hourCycle: 'h23',
  }).format(ts);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch {
    return false;
  }
}

import { isValid, parseISO } from 'date-fns';

const ITEM_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const ISO_DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;
const ISO_ZONE_PATTERN = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
// 例: "Tue, 09 Jan 2024 13:00:00 GMT"。末尾のタイムゾーンは省略されることがある
const RFC_2822_PATTERN = /^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?(?:\s+(\S+))?$/;

// Date を YYYY-MM-DD HH:MM:SS (UTC) に整形する
export function formatItemDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * 保存形式の日付文字列を UTC として解釈する。
 * 時刻部分は省略可。2月30日のような存在しない日時は繰り上げずに undefined
 */
export function parseItemDate(value: string): Date | undefined {
  const match = ITEM_DATE_PATTERN.exec(value.trim());
  if (!match) return undefined;
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(part => Number(part ?? '0'));

  // Date.UTC は 0〜99 年を 1900 年代に読み替えるため setUTCFullYear で組み立てる
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  const exact = date.getUTCFullYear() === year
    && date.getUTCMonth() === month - 1
    && date.getUTCDate() === day
    && date.getUTCHours() === hours
    && date.getUTCMinutes() === minutes
    && date.getUTCSeconds() === seconds;
  return exact ? date : undefined;
}

/**
 * フィードが返す公開日時を解釈する。
 * 保存形式・ISO-8601・RFC 2822 (RSS pubDate)・Date を受け付け、
 * タイムゾーンの無い文字列は UTC とみなす
 */
export function parsePublishedAt(value: string | Date): Date | undefined {
  if (value instanceof Date) {
    return isValid(value) ? value : undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  if (ITEM_DATE_PATTERN.test(trimmed)) {
    return parseItemDate(trimmed);
  }

  if (ISO_DATE_TIME_PATTERN.test(trimmed)) {
    const parsed = parseISO(ISO_ZONE_PATTERN.test(trimmed) ? trimmed : `${trimmed}Z`);
    return isValid(parsed) ? parsed : undefined;
  }

  const rfc = RFC_2822_PATTERN.exec(trimmed);
  if (rfc) {
    const parsed = new Date(rfc[1] ? trimmed : `${trimmed} GMT`);
    return isValid(parsed) ? parsed : undefined;
  }
  return undefined;
}

// YYYY-MM-DD 部分。アーカイブの日別パーティションのキーになる
export function dayOf(date: string): string {
  return date.slice(0, 10);
}

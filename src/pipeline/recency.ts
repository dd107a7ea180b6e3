import { hoursToMilliseconds } from 'date-fns';
import type { Item } from './types.js';
import { parseItemDate } from './dates.js';

const NEW_WINDOW_MS = hoursToMilliseconds(24);

/**
 * 公開から24時間以内（両端を含む）なら新着とみなす。
 * 未来日付は新着扱いしない
 */
export function isNew(date: Date, now: Date, windowMs: number = NEW_WINDOW_MS): boolean {
  const age = now.getTime() - date.getTime();
  return age >= 0 && age <= windowMs;
}

// 保存形式の日付文字列に対する isNew。解釈できない日付は新着にしない
export function isItemNew(item: Pick<Item, 'date'>, now: Date): boolean {
  const date = parseItemDate(item.date);
  return date ? isNew(date, now) : false;
}

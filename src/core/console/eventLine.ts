/**
 * Event line prefix formatting.
 *
 * With timestamps: `[YYYY-MM-DD HH:MM:SS] LEVEL   `
 * Without:         `LEVEL   `
 */

export const EVENT_LEVEL_WIDTH = 7;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** Upper-case a level and fit it to exactly seven columns */
export function formatEventLevel(level: string): string {
  return level.toUpperCase().padEnd(EVENT_LEVEL_WIDTH).slice(0, EVENT_LEVEL_WIDTH);
}

export function formatEventPrefix(level: string, timestamp?: Date): string {
  const lvl = formatEventLevel(level);
  return timestamp ? `[${formatTimestamp(timestamp)}] ${lvl} ` : `${lvl} `;
}

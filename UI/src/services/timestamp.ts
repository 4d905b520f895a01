function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Render a duration as "N minute(s) and S.SS second(s)", or "S.SS second(s)"
 * when it is under a minute.
 */
export function formatElapsedTime(elapsedSeconds: number, precision = 2): string {
  const minutes = Math.floor(elapsedSeconds / 60);
  const seconds = elapsedSeconds - minutes * 60;

  if (minutes > 0) {
    return `${minutes} minute(s) and ${seconds.toFixed(precision)} second(s)`;
  }
  return `${seconds.toFixed(precision)} second(s)`;
}

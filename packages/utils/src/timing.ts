export function elapsedMilliseconds(startTime: Date | number): number {
  return Date.now() - new Date(startTime).getTime();
}

export function elapsedSecondsLog(startTime: Date | number): string {
  return `${(elapsedMilliseconds(startTime) / 1000).toFixed(2)}s`;
}

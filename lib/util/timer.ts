/**
 * Measures a single step of a run, for debug logging
 */
export class Timer {
  public timeS?: number;
  private readonly startTime = Date.now();

  constructor(public readonly label: string) {
  }

  public stop() {
    if (this.timeS !== undefined) { return this; }
    this.timeS = (Date.now() - this.startTime) / 1000;
    return this;
  }

  public humanTime() {
    if (this.timeS === undefined) { return '???'; }
    return humanTime(this.timeS);
  }

  public toString() {
    return `${this.label} in ${this.humanTime()}`;
  }
}

export function humanTime(time: number) {
  const parts = [];

  if (time > 60) {
    const mins = Math.floor(time / 60);
    parts.push(mins + 'm');
    time -= mins * 60;
  }
  parts.push(time.toFixed(1) + 's');

  return parts.join('');
}

/**
 * Control state: the global pause switch
 */
export class ControlRepository {
  private paused = false;
  private changedAt: number | null = null;

  isPaused(): boolean {
    return this.paused;
  }

  lastChangedAt(): number | null {
    return this.changedAt;
  }

  setPaused(paused: boolean, at: number): void {
    this.paused = paused;
    this.changedAt = at;
  }
}

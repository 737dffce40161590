export type RoundTimerHooks = {
  onTick: (secondsLeft: number) => void;
  onExpire: () => void;
};

// One countdown per room, ticking once a second
export class RoundTimer {
  private timers: Map<string, NodeJS.Timeout> = new Map();

  start(roomCode: string, durationSeconds: number, hooks: RoundTimerHooks) {
    this.cancel(roomCode);
    let secondsLeft = durationSeconds;
    const handle = setInterval(() => {
      secondsLeft -= 1;
      if (secondsLeft <= 0) {
        this.cancel(roomCode);
        hooks.onExpire();
        return;
      }
      hooks.onTick(secondsLeft);
    }, 1000);
    handle.unref?.();
    this.timers.set(roomCode, handle);
  }

  cancel(roomCode: string): boolean {
    const handle = this.timers.get(roomCode);
    if (!handle) return false;
    clearInterval(handle);
    this.timers.delete(roomCode);
    return true;
  }

  isRunning(roomCode: string): boolean {
    return this.timers.has(roomCode);
  }

  stopAll() {
    for (const handle of this.timers.values()) clearInterval(handle);
    this.timers.clear();
  }
}

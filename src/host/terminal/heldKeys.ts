// Terminals report key presses (and auto-repeat) but never releases, so a key
// counts as held until `holdMs` after its most recent press.
export class HeldKeys {
  private lastPress = new Map<string, number>();

  constructor(private readonly holdMs = 150) {}

  press(name: string, now: number) { this.lastPress.set(name, now); }

  held(now: number): string[] {
    const out: string[] = [];
    for (const [name, t] of this.lastPress) {
      if (now - t < this.holdMs) out.push(name);
      else this.lastPress.delete(name);
    }
    return out;
  }
}

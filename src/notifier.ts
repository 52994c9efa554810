import { formatISO } from "date-fns";

export interface Notifier {
  playAlert(): void;
  showExpiryDialog(label: string): void;
}

export interface ExpiryDialog {
  title: string;
  label: string;
  raisedAt: string;
}

export function expiryTitle(label: string): string {
  return `End of the ${label} timer`;
}

/** Rings the terminal bell and logs the expiry. */
export class TerminalNotifier implements Notifier {
  constructor(private readonly out: NodeJS.WritableStream = process.stderr) {}

  playAlert(): void {
    this.out.write("\u0007");
  }

  showExpiryDialog(label: string): void {
    console.log(expiryTitle(label));
  }
}

/** Keeps the latest expiry dialog until a client acknowledges it. */
export class ExpiryDialogs implements Notifier {
  private current: ExpiryDialog | null = null;

  // The sound belongs to the other notifiers; a dialog holder has nothing to ring.
  playAlert(): void {}

  showExpiryDialog(label: string): void {
    this.current = {
      title: expiryTitle(label),
      label,
      raisedAt: formatISO(new Date())
    };
  }

  pending(): ExpiryDialog | null {
    return this.current;
  }

  acknowledge(): boolean {
    const hadDialog = this.current !== null;
    this.current = null;
    return hadDialog;
  }
}

export class FanoutNotifier implements Notifier {
  constructor(private readonly notifiers: Notifier[]) {}

  playAlert(): void {
    for (const notifier of this.notifiers) {
      notifier.playAlert();
    }
  }

  showExpiryDialog(label: string): void {
    for (const notifier of this.notifiers) {
      notifier.showExpiryDialog(label);
    }
  }
}

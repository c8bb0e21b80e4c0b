import ora, { type Ora } from "ora";

export interface ProgressReporter {
  start(total: number): void;
  tick(name: string): void;
  stop(): void;
  /** Runs `write` with the progress line out of the way of other terminal output. */
  interrupt(write: () => void): void;
}

export class SilentProgress implements ProgressReporter {
  start(_total: number): void {}
  tick(_name: string): void {}
  stop(): void {}
  interrupt(write: () => void): void {
    write();
  }
}

export interface SpinnerOptions {
  stream?: NodeJS.WritableStream;
  isEnabled?: boolean;
}

export class SpinnerProgress implements ProgressReporter {
  private spinner: Ora | null = null;
  private total = 0;
  private done = 0;

  constructor(private readonly options: SpinnerOptions = {}) {}

  start(total: number): void {
    this.total = total;
    this.done = 0;
    this.spinner = ora({ ...this.options, text: this.label(), discardStdin: false }).start();
  }

  // the mover loop is synchronous, so the spinner's own timer never gets to redraw
  tick(name: string): void {
    this.done++;
    if (!this.spinner) return;
    this.spinner.text = `${this.label()} ${name}`;
    this.spinner.render();
  }

  stop(): void {
    this.spinner?.succeed(this.label());
    this.spinner = null;
  }

  interrupt(write: () => void): void {
    if (!this.spinner) {
      write();
      return;
    }
    this.spinner.clear();
    write();
    this.spinner.render();
  }

  private label(): string {
    return `Organizing files ${this.done}/${this.total}`;
  }
}

// ora draws on stderr
export function selectProgress(enabled: boolean, isTTY = Boolean(process.stderr.isTTY)): ProgressReporter {
  return enabled && isTTY ? new SpinnerProgress() : new SilentProgress();
}

import readline from 'node:readline';

type SpinnerStyle = 'dots' | 'lines';

/** Progress indicator on stderr; silent when stderr is not a terminal. */
export class Spinner {
  private interval: NodeJS.Timeout | null = null;
  private styles: Record<SpinnerStyle, string[]> = {
    dots: ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'],
    lines: ['-', '\\', '|', '/'],
  };
  private currentFrame = 0;
  private text = '';
  private speed = 80;
  private style: SpinnerStyle = 'dots';
  private readonly stream: NodeJS.WriteStream;

  constructor(opts?: { style?: SpinnerStyle; speed?: number; stream?: NodeJS.WriteStream }) {
    if (opts?.style) this.style = opts.style;
    if (opts?.speed) this.speed = opts.speed;
    this.stream = opts?.stream ?? process.stderr;
  }

  get enabled() {
    return Boolean(this.stream.isTTY);
  }

  start(text: string) {
    this.text = text;
    if (!this.enabled || this.interval) return;
    this.stream.write('\x1B[?25l'); // Hide cursor
    this.interval = setInterval(() => {
      const frames = this.styles[this.style];
      this.currentFrame = (this.currentFrame + 1) % frames.length;
      readline.cursorTo(this.stream, 0);
      readline.clearLine(this.stream, 1);
      this.stream.write(`\x1B[36m${frames[this.currentFrame]}\x1B[0m ${this.text}`);
    }, this.speed);
  }

  stop(success = true) {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    readline.cursorTo(this.stream, 0);
    readline.clearLine(this.stream, 1);
    if (success) {
      this.stream.write('\x1B[32m✓\x1B[0m ' + this.text + '\n');
    } else {
      this.stream.write('\x1B[31m✗\x1B[0m ' + this.text + '\n');
    }
    this.stream.write('\x1B[?25h'); // Show cursor
  }

  update(text: string) {
    this.text = text;
  }
}

import chalk, { Chalk, type ChalkInstance } from "chalk";

export type Painter = {
  green: (text: string) => string;
  yellow: (text: string) => string;
};

export type ReporterOptions = {
  color?: boolean;
  write?: (line: string) => void;
};

const RULE = "═".repeat(50);

/** Human-facing progress output. Everything diagnostic goes to the provisioning log instead. */
export class Reporter {
  private readonly paint: ChalkInstance;
  private readonly write: (line: string) => void;

  constructor(options: ReporterOptions = {}) {
    this.paint = new Chalk({ level: options.color === false ? 0 : chalk.level });
    this.write = options.write ?? ((line) => console.log(line));
  }

  get painter(): Painter {
    return {
      green: (text) => this.paint.green(text),
      yellow: (text) => this.paint.yellow(text),
    };
  }

  banner(title: string): void {
    this.write(this.paint.green(RULE));
    this.write(this.paint.green(`  ${title}`));
    this.write(this.paint.green(RULE));
  }

  blank(): void {
    this.write("");
  }

  step(index: number, total: number, title: string): void {
    this.write(this.paint.yellow(`[${index}/${total}] ${title}`));
  }

  ok(message: string): void {
    this.write(`  ✅ ${message}`);
  }

  action(icon: string, message: string): void {
    this.write(`  ${icon} ${message}`);
  }

  note(message: string): void {
    this.write(`  ${message}`);
  }

  warn(message: string): void {
    this.write(this.paint.yellow(`  ⚠️  ${message}`));
  }

  failure(message: string): void {
    this.write(this.paint.red(`✖ ${message}`));
  }

  lines(lines: string[]): void {
    for (const line of lines) this.write(line);
  }
}

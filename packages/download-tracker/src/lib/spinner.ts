/**
 * Spinner wrapper that stays silent in JSON mode and off-TTY.
 */

import ora, { type Ora } from "ora";
import { canAnimate, type OutputMode } from "./output/mode.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

/**
 * No-op spinner for JSON mode and pipes.
 */
class SilentSpinner implements Spinner {
  text = "";

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

export function createSpinner(mode: OutputMode, text?: string): Spinner {
  if (!canAnimate(mode)) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}

/**
 * Readiness checker: runs the banner, the ordered checks and the summary,
 * writing each block to the sink as soon as it is produced.
 *
 * Failed checks are advisory only; nothing here throws on a failed condition.
 */
import { logReadiness } from "../logging.js";
import { paint } from "../shared/colors.js";
import type { Settings } from "../settings/schema.js";
import { READINESS_CHECKS, bannerMessage, summaryMessage, type Message } from "./checks.js";

/** Anything with a string `write`, e.g. process.stdout */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface RunOptions {
  colorize?: boolean;
}

export interface ReadinessReport {
  messages: Message[];
}

/** Write one block, adding a newline unless the rendered text already ends with one. */
export function writeMessage(out: OutputSink, message: Message, colorize: boolean): void {
  const rendered = paint(message.style, message.text, colorize);
  out.write(rendered.endsWith("\n") ? rendered : `${rendered}\n`);
}

export function runReadinessCheck(
  settings: Settings,
  out: OutputSink,
  options: RunOptions = {},
): ReadinessReport {
  const colorize = options.colorize ?? false;
  const messages: Message[] = [];

  const emit = (message: Message) => {
    messages.push(message);
    writeMessage(out, message, colorize);
  };

  emit(bannerMessage());

  for (const check of READINESS_CHECKS) {
    const message = check.run(settings);
    logReadiness.debug({ check: check.name, style: message?.style ?? "silent" }, "Check evaluated");
    if (message) emit(message);
  }

  emit(summaryMessage(settings));

  const failed = messages.filter((m) => m.style === "error").length;
  const warned = messages.filter((m) => m.style === "warning").length;
  logReadiness.info({ errors: failed, warnings: warned }, "Readiness check complete");

  return { messages };
}

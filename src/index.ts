#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { initCommand } from "./commands/init";
import { redactCommand } from "./commands/redact";
import { detectCommand } from "./commands/detect";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

const program = new Command();

program
  .name("face-redactor")
  .description("Blur faces detected by AWS Rekognition")
  .version("0.1.0");

program
  .command("init")
  .description("Create a config file")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("redact")
  .description("Blur every detected face in an image")
  .argument("<input>", "Image to redact (JPEG or PNG)")
  .option("-o, --output <path>", "Output path (default: <name>.redacted.<ext> next to the input)")
  .option("-f, --format <format>", "Output format: jpeg, png or webp (default: input format)")
  .option("-t, --blur-type <type>", "Blur type: gaussian or pixelate")
  .option("-s, --strength <percent>", "Blur kernel size as % of the face's smaller side", parseInteger)
  .option("--min-confidence <n>", "Ignore detections below n%", parseNumber)
  .option("--retries <n>", "Retries for throttled or failed detection calls (0-3)", parseInteger)
  .option("--timeout <ms>", "Detection deadline in milliseconds", parseInteger)
  .action(redactCommand);

program
  .command("detect")
  .description("List faces Rekognition finds in an image without modifying it")
  .argument("<input>", "Image to inspect (JPEG or PNG)")
  .option("--min-confidence <n>", "Mark detections below n% as ignored", parseNumber)
  .option("--json", "Output as JSON")
  .action(detectCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

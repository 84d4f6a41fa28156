import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { getDefaultConfig, getGlobalConfigDir, loadConfig } from "../config";
import { RedactionError } from "../errors";

export interface InitOptions {
  local?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  // Determine config path based on --local flag
  let configPath: string;
  if (options.local) {
    configPath = join(process.cwd(), "config.yaml");
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (!existsSync(configPath)) {
    spinner.start("Creating config file...");
    writeFileSync(configPath, getDefaultConfig());
    spinner.succeed(`Created config file: ${configPath}`);
  } else {
    spinner.info(`Config file already exists: ${configPath}`);
  }

  try {
    const config = loadConfig();
    spinner.succeed(
      `Configuration valid (region ${config.aws.region}, ${config.redaction.blurType} blur, min confidence ${config.rekognition.minConfidence}%)`
    );
  } catch (error) {
    if (!(error instanceof RedactionError)) throw error;
    spinner.fail(error.message);
    process.exit(1);
  }

  console.log("\nNext steps:");
  console.log("1. Configure AWS credentials (AWS_PROFILE or AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY)");
  console.log("2. Run: face-redactor detect ./photo.jpg");
  console.log("3. Run: face-redactor redact ./photo.jpg");
}

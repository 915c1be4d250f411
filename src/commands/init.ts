import * as fs from "fs";
import * as path from "path";
import type { InitArgs } from "../cli/parseArgs";
import { CONFIG_FILE_NAMES } from "../config/loader";
import { DEFAULT_CONFIG_TEMPLATE } from "../config/template";
import { writeFileAtomic } from "../lib/atomicWrite";
import { UsageError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { EXIT_OK } from "../pipeline/report";
import type { CommandContext } from "./context";

const log = createLogger("init");

/** Write the default config to the current directory. */
export async function runInit(args: InitArgs, ctx: CommandContext): Promise<number> {
  const target = path.join(ctx.cwd, CONFIG_FILE_NAMES[0]);
  if (fs.existsSync(target) && !args.force) {
    throw new UsageError(`${CONFIG_FILE_NAMES[0]} already exists. Use --force to overwrite.`);
  }
  await writeFileAtomic(target, DEFAULT_CONFIG_TEMPLATE);
  log.info(`Created ${target}`);
  log.info("Edit [project] source/output, then run 'assetpress build'.");
  return EXIT_OK;
}

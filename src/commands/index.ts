import { USAGE, type CommandArgs } from "../cli/parseArgs";
import { assertNever } from "../lib/assertNever";
import { EXIT_OK } from "../pipeline/report";
import { runAtlas } from "./atlas";
import { runAudio } from "./audio";
import { runBuild } from "./build";
import { runClean } from "./clean";
import type { CommandContext } from "./context";
import { runInfo } from "./info";
import { runInit } from "./init";
import { runModel } from "./model";
import { runOptimize } from "./optimize";
import { runWatch } from "./watch";

export type { CommandContext };

/** Run one parsed command and return its process exit code. */
export async function runCommand(args: CommandArgs, ctx: CommandContext): Promise<number> {
  switch (args.command) {
    case "init":
      return runInit(args, ctx);
    case "optimize":
      return runOptimize(args, ctx);
    case "build":
      return (await runBuild(args, ctx)).exitCode;
    case "atlas":
      return runAtlas(args, ctx);
    case "watch":
      return runWatch(args, ctx);
    case "model":
      return runModel(args, ctx);
    case "audio":
      return runAudio(args, ctx);
    case "info":
      return runInfo(args, ctx);
    case "clean":
      return runClean(args, ctx);
    case "help":
      console.log(USAGE);
      return EXIT_OK;
    default:
      return assertNever(args, "command");
  }
}

import { Command } from "commander";
import { LogLevel, logger } from "../lib/utils/logger.ts";
import { XfsForgeError } from "../lib/utils/errors.ts";
import { DEFAULT_CLI_DEFAULTS } from "../lib/format/interfaces/index.ts";
import { parsePositiveInteger } from "../utils/app-utils.ts";
import type { CreateOptions, InflateOptions, InspectOptions } from "./types.ts";

function applyVerbosity(program: Command): void {
  const globalOptions = program.opts<{ verbose: boolean }>();
  if (globalOptions.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
}

export function fail(error: unknown): never {
  if (error instanceof XfsForgeError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exit(1);
}

export function setupCLI() {
  const program = new Command();
  const defaults = DEFAULT_CLI_DEFAULTS;

  program
    .name("xfsforge")
    .description("Build and inflate synthetic XFS images for recovery testing")
    .version("1.0.0")
    .option("-v, --verbose", "Show detailed logs for every step", false);

  program
    .command("create [output]")
    .description("Create a new XFS test image with seeded recoverable content")
    .option("--size <mb>", "Logical size in megabytes", String(defaults.sizeMb))
    .action(async (outputArg: string | undefined, raw: { size: string }) => {
      applyVerbosity(program);

      let options: CreateOptions;
      try {
        options = {
          output: outputArg ?? defaults.imagePath,
          size: parsePositiveInteger(raw.size, "--size"),
        };
      } catch (error) {
        fail(error);
      }

      const { CreateApp } = await import("../components/CreateApp.tsx");
      const { render } = await import("ink");
      render(<CreateApp options={options} />);
    });

  program
    .command("inflate [input] [output]")
    .description(
      "Rewrite an image's superblock so it reports a much larger size",
    )
    .option(
      "--target <gb>",
      "Target logical size in gigabytes",
      String(defaults.targetGb),
    )
    .option(
      "--min-physical <mb>",
      "Minimum physical size of the output in megabytes",
      String(defaults.minPhysicalMb),
    )
    .action(
      async (
        inputArg: string | undefined,
        outputArg: string | undefined,
        raw: { target: string; minPhysical: string },
      ) => {
        applyVerbosity(program);

        let options: InflateOptions;
        try {
          options = {
            input: inputArg ?? defaults.imagePath,
            output: outputArg ?? defaults.inflatedPath,
            target: parsePositiveInteger(raw.target, "--target"),
            minPhysical: parsePositiveInteger(
              raw.minPhysical,
              "--min-physical",
            ),
          };
        } catch (error) {
          fail(error);
        }

        const { InflateApp } = await import("../components/InflateApp.tsx");
        const { render } = await import("ink");
        render(<InflateApp options={options} />);
      },
    );

  program
    .command("inspect <image>")
    .description("Show the superblock and seed content of an image")
    .action(async (image: string) => {
      applyVerbosity(program);

      const options: InspectOptions = { image };
      const { InspectApp } = await import("../components/InspectApp.tsx");
      const { render } = await import("ink");
      render(<InspectApp options={options} />);
    });

  return program;
}

/* eslint no-console: "off" */

import * as url from "node:url";
import * as fs from "node:fs";
import { app, configPath, loadConfig, participantFromConfig } from "./index.js";

const USAGE = `usage: ringsum once [--config <path>]
       ringsum serve [port] [--config <path>]

The configuration path may also be given in RINGSUM_CONFIG_PATH.`;

const DEFAULT_PORT = 8080;

export function parsePort(input: string | undefined): number {
  if (input === undefined) return DEFAULT_PORT;
  const port = parseInt(input, 10);
  if (isNaN(port) || port < 0 || port > 65535 || String(port) !== input) {
    throw new Error(`${input} is not a valid port`);
  }
  return port;
}

export async function main(argv: readonly string[]): Promise<number> {
  const [command, ...rest] = argv;
  const positional = rest.filter(
    (arg, i) =>
      !arg.startsWith("--config") && rest[i - 1] !== "--config",
  );

  switch (command) {
    case "once": {
      const participant = participantFromConfig(
        await loadConfig(configPath(rest)),
      );
      const report = await participant.invoke();
      console.log(JSON.stringify(report, null, 2));
      return 0;
    }

    case "serve": {
      const port = parsePort(positional[0]);
      const participant = participantFromConfig(
        await loadConfig(configPath(rest)),
      );
      console.debug(`Starting server on port ${port}`);
      app(participant).listen(port);
      return 0;
    }

    default:
      console.error(USAGE);
      return 2;
  }
}

function run() {
  main(process.argv.slice(2)).then(
    (code) => {
      if (code !== 0) process.exitCode = code;
    },
    (error: unknown) => {
      console.error(String(error));
      process.exitCode = 1;
    },
  );
}

const entry = process.argv[1];
if (
  entry !== undefined &&
  fs.existsSync(entry) &&
  fs.realpathSync(entry) === url.fileURLToPath(import.meta.url)
) {
  run();
}

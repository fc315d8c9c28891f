import type { Request, Response } from "express";
import express from "express";
import type { Logger } from "@ringsum/protocol";
import { Participant } from "@ringsum/protocol";
import type { RingSource } from "@ringsum/ring";
import { HttpRingSource, StaticRingSource } from "@ringsum/ring";
import type { Storage } from "@ringsum/storage";
import { FileSystemStorage } from "@ringsum/storage";
import type { RunnerConfig } from "./config.js";

export {
  CONFIG_PATH_ENV,
  configPath,
  loadConfig,
  sanitizeConfig,
} from "./config.js";
export type { RunnerConfig } from "./config.js";

export interface RunnerOptions {
  /** defaults to a {@linkcode FileSystemStorage} rooted at `dataDir` */
  storage?: Storage;
  logger?: Logger;
}

export function ringSourceFor(config: RunnerConfig): RingSource {
  if (config.ring !== undefined) return new StaticRingSource(config.ring);
  if (config.ringUrl !== undefined) return new HttpRingSource(config.ringUrl);
  throw new Error("configuration names neither ring nor ringUrl");
}

export function participantFromConfig(
  config: RunnerConfig,
  options: RunnerOptions = {},
): Participant {
  return new Participant({
    identity: config.identity,
    storage: options.storage ?? new FileSystemStorage(config.dataDir),
    ringSource: ringSourceFor(config),
    appName: config.appName,
    aggregateMode: config.aggregateMode,
    autoGenerateRecord: config.autoGenerateRecord,
    fields: config.fields,
    logger: options.logger,
  });
}

async function runHandler(
  participant: Participant,
  logger: Logger,
  res: Response,
): Promise<void> {
  try {
    const report = await participant.invoke();
    res.send({ status: "success", report });
  } catch (error) {
    logger.error(`run failed: ${String(error)}`);
    // The trigger itself worked, so this still answers 200 OK.
    res.send({ status: "error", error: String(error) });
  }
}

/**
   An HTTP trigger for a scheduler: each `POST /internal/run` is one
   invocation of the participant.
 */
export function app(
  participant: Participant,
  logger: Logger = console,
): express.Express {
  const app = express();
  app.use(express.json());

  app.post("/internal/ready", (_req: Request, res: Response) => {
    res.send({});
  });

  app.post("/internal/run", (_req, res, next) => {
    runHandler(participant, logger, res).catch(next);
  });

  return app;
}

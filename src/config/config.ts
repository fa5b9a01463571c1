import "./env";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { SchemaError, errorMessage } from "../domain/errors";
import { timeGranularities } from "../domain/time";
import { PipelineSettings, TimeGranularity } from "../domain/types";
import { LogLevel, parseLogLevel } from "./logger";

const granularitySchema = z.enum(timeGranularities);

export const PipelineFileSchema = z
  .object({
    granularity: granularitySchema.default("month"),
    columnMappings: z.record(z.string().min(1)).default({}),
    excludedComponents: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

export interface AppConfig {
  pipeline: PipelineSettings;
  paths: {
    dataDir: string;
    outputDir: string;
    pipelineConfig: string;
  };
  logLevel: LogLevel;
  logDir?: string;
  nodeEnv: "development" | "production" | "test" | string;
}

type Env = Record<string, string | undefined>;

/**
 * Reads the column mapping and excluded component codes. A missing file
 * yields an empty mapping and no exclusions; a malformed one is an error.
 */
export function loadPipelineSettings(filePath: string): PipelineSettings {
  if (!fs.existsSync(filePath)) {
    return PipelineFileSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new SchemaError(filePath, `pipeline config is not valid JSON (${errorMessage(err)})`, "config");
  }

  const parsed = PipelineFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? issue.path.join(".") : filePath;
    throw new SchemaError(where, issue.message, "config");
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const cwd = process.cwd();
  const pipelineConfig = path.resolve(cwd, env.PIPELINE_CONFIG || path.join("config", "pipeline.json"));
  const fromFile = loadPipelineSettings(pipelineConfig);

  let granularity: TimeGranularity = fromFile.granularity;
  if (env.TIME_BUCKET) {
    const bucket = granularitySchema.safeParse(env.TIME_BUCKET.trim().toLowerCase());
    if (!bucket.success) {
      throw new SchemaError("TIME_BUCKET", `expected one of ${timeGranularities.join(", ")}`, "config");
    }
    granularity = bucket.data;
  }

  return {
    pipeline: { ...fromFile, granularity },
    paths: {
      dataDir: path.resolve(cwd, env.DATA_DIR || "data"),
      outputDir: path.resolve(cwd, env.OUTPUT_DIR || "output"),
      pipelineConfig,
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logDir: env.LOG_DIR || undefined,
    nodeEnv: env.NODE_ENV || "development",
  };
}

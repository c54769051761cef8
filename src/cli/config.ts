import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { isLogLevel } from './logger';
import type { LogLevel } from './logger';
import { parsePort } from './prompt';

/**
 * Settings a demo program can take from its --config file
 */
export interface DemoConfig {
  host?: string;
  port?: number;
  unixPath?: string;
  logLevel?: LogLevel;
}

export const DEFAULT_UNIX_PATH = path.join(os.tmpdir(), 'sockwell_demo.sock');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and check a JSON config file; unknown keys are ignored
 */
export async function loadDemoConfig(configPath?: string): Promise<DemoConfig> {
  if (!configPath) {
    return {};
  }
  if (!(await fs.pathExists(configPath))) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const raw: unknown = await fs.readJson(configPath);
  if (!isRecord(raw)) {
    throw new Error(`Config file must contain a JSON object: ${configPath}`);
  }

  const config: DemoConfig = {};
  if (typeof raw.host === 'string') {
    config.host = raw.host;
  }
  if (raw.port !== undefined) {
    const port = parsePort(String(raw.port));
    if (port === null) {
      throw new Error(`Invalid port in config file: ${String(raw.port)}`);
    }
    config.port = port;
  }
  if (typeof raw.unixPath === 'string') {
    config.unixPath = raw.unixPath;
  }
  if (typeof raw.logLevel === 'string') {
    if (!isLogLevel(raw.logLevel)) {
      throw new Error(`Invalid log level in config file: ${raw.logLevel}`);
    }
    config.logLevel = raw.logLevel;
  }
  return config;
}

import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

// Resolve paths relative to the backend folder (where package.json is)
const backendRoot = path.resolve(__dirname, '..');

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  port: number;
  uploadPath: string;
  maxUploadMb: number;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const num = parseInt(value, 10);
  return isNaN(num) || num <= 0 ? fallback : num;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  return {
    port: parsePositiveInt(env.PORT, 3001),
    uploadPath: path.resolve(backendRoot, env.UPLOAD_PATH || 'data/uploads'),
    maxUploadMb: parsePositiveInt(env.MAX_UPLOAD_MB, 50),
    logLevel: isLogLevel(level) ? level : 'info',
  };
}

export const config = loadConfig();

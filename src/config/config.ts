import * as dotenv from 'dotenv';
dotenv.config();

export interface ExecutorConfig {
  disposeTimeoutMs: number;
  defaultTimeoutMs: number;
}

export interface Config {
  port: number;
  executor: ExecutorConfig;
}

const config: () => Config = () => ({
  port: Number(process.env.PORT ?? 3050),
  executor: {
    disposeTimeoutMs: Number(process.env.EXECUTOR_DISPOSE_TIMEOUT_MS ?? 5000),
    defaultTimeoutMs: Number(process.env.EXECUTOR_DEFAULT_TIMEOUT_MS ?? 30000),
  },
});

export default config;

import pino from "pino";
import { env } from "../config/env.js";
import { SERVICE_NAME } from "./service-info.js";

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: SERVICE_NAME },
  timestamp: pino.stdTimeFunctions.isoTime,
});

import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: "chunkgraph",
  level: appConfig.LOG_LEVEL
});

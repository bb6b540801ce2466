import { pino } from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: "finhop",
  level: appConfig.LOG_LEVEL,
  enabled: appConfig.NODE_ENV !== "test"
});

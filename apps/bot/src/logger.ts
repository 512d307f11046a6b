import pino from "pino";

export const logger = pino({
  name: "ritualclub-bot",
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label })
  }
});

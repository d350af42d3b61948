import pino from "pino";

const env = process.env.NODE_ENV;
const isTest = env === "test";
const usePretty = env !== "production" && !isTest;

// The menu owns stdout, so logs go to stderr.
const level = process.env.LOG_LEVEL || (isTest ? "silent" : "warn");

export const logger = usePretty
  ? pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino({ level }, pino.destination(2));

export type Logger = pino.Logger;

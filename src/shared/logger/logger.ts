import pino, { type LevelWithSilent } from "pino";

const levelFor = (nodeEnv: string | undefined): LevelWithSilent => {
  if (nodeEnv === "production") {
    return "info";
  }

  return nodeEnv === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "filings-api",
  level: levelFor(process.env.NODE_ENV),
});

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

import pino from "pino";

const levelFor = (nodeEnv: string | undefined): pino.LevelWithSilent => {
  if (nodeEnv === "test") {
    return "silent";
  }

  return nodeEnv === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "ai-universe-curator",
  level: levelFor(process.env.NODE_ENV),
});

import bunyan from "bunyan";

const LEVELS: readonly string[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is bunyan.LogLevelString {
  return LEVELS.includes(value);
}

const level = process.env.LOG_LEVEL || "info";

const log = bunyan.createLogger({
  name: "taproom-server",
  level: isLogLevel(level) ? level : "info",
});

export default log;

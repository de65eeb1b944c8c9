export {
  consoleLogger,
  formatLogLine,
  formatTimestamp,
  levelName,
  lineLogger,
  makeLoggerLayer,
} from "./logger";

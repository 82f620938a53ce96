import { Either } from "effect";
import { loadAppConfig } from "../schemas/appConfig";
import { appLogger, setLogLevel } from "../services/appLogger";
import { serializeError } from "../services/runtime";
import { createApp } from "./app";

const loaded = loadAppConfig(process.env);
if (Either.isLeft(loaded)) {
  appLogger.error("invalid_config", serializeError(loaded.left));
  process.exit(2);
}
const config = loaded.right;
setLogLevel(config.logLevel);

createApp({ modelName: config.modelName }).listen(config.port, () => {
  appLogger.info("server_listening", { port: config.port, modelName: config.modelName });
});

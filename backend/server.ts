import createApp from "./app";
import { loadConfig } from "./config/env";
import connectMongo, { disconnectMongo } from "./database/mongoClient";
import { closeRedisClient } from "./cache/redisClient";
import { createContainer } from "./container";
import { disconnectKafka, getKafkaProducer } from "./queue/kafka";
import logger from "./utils/logger";

const startServer = async (): Promise<void> => {
  try {
    const config = loadConfig();
    await connectMongo(config.mongoUri);
    const container = createContainer(config);
    await getKafkaProducer(config.kafka);

    if (!(await container.modelClient.checkAvailability())) {
      logger.warn({ host: config.ollama.host }, "Model service is not reachable yet");
    }

    createApp(config, container).listen(config.port, () => {
      logger.info({ port: config.port }, "API listening");
    });
  } catch (err) {
    logger.error({ err }, "Failed to bootstrap application");
    process.exit(1);
  }
};

const shutdown = async (signal: NodeJS.Signals) => {
  logger.info({ signal }, "Shutting down gracefully");
  await Promise.allSettled([disconnectMongo(), closeRedisClient(), disconnectKafka()]);
  process.exit(0);
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

void startServer();

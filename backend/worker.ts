import { z } from "zod";
import { loadConfig } from "./config/env";
import connectMongo, { disconnectMongo } from "./database/mongoClient";
import { closeRedisClient } from "./cache/redisClient";
import { createContainer } from "./container";
import type { Consumer } from "kafkajs";
import { createKafkaConsumer, disconnectKafka } from "./queue/kafka";
import logger from "./utils/logger";

const jobPayloadSchema = z.object({
  analysisId: z.string().min(1),
  contractId: z.string().min(1),
});

let consumer: Consumer | null = null;

const startWorker = async (): Promise<void> => {
  const config = loadConfig();
  await connectMongo(config.mongoUri);
  const { analysisService } = createContainer(config);

  const jobConsumer = await createKafkaConsumer(config.kafka, `${config.kafka.clientId}-worker`);
  consumer = jobConsumer;
  await jobConsumer.subscribe({ topic: config.kafka.topic, fromBeginning: false });

  await jobConsumer.run({
    eachMessage: async ({ message }) => {
      if (!message.value) {
        logger.warn("Received message without value");
        return;
      }
      const raw = message.value.toString();
      try {
        const payload = jobPayloadSchema.parse(JSON.parse(raw));
        await analysisService.processAnalysisJob(payload);
      } catch (err) {
        logger.error({ err, message: raw }, "Failed to process analysis job");
      }
    },
  });

  logger.info("Worker ready to process analysis jobs");
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info({ signal }, "Worker shutting down");
  await consumer?.disconnect();
  await Promise.allSettled([disconnectMongo(), closeRedisClient(), disconnectKafka()]);
  process.exit(0);
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

startWorker().catch((err) => {
  logger.error({ err }, "Worker failed to start");
  process.exit(1);
});

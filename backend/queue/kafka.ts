import { Kafka, Producer, Consumer } from "kafkajs";
import type { KafkaSettings } from "../config/env";
import type { AnalysisJobPayload } from "../types/analysis";
import logger from "../utils/logger";

let kafkaInstance: Kafka | null = null;
let producerInstance: Producer | null = null;

export const getKafka = (settings: KafkaSettings): Kafka => {
  if (!kafkaInstance) {
    kafkaInstance = new Kafka({
      clientId: settings.clientId,
      brokers: settings.brokers,
      retry: {
        retries: 5,
      },
    });
  }
  return kafkaInstance;
};

export const getKafkaProducer = async (settings: KafkaSettings): Promise<Producer> => {
  if (producerInstance) {
    return producerInstance;
  }

  producerInstance = getKafka(settings).producer();
  await producerInstance.connect();
  logger.info("Kafka producer connected");
  return producerInstance;
};

export const createKafkaConsumer = async (
  settings: KafkaSettings,
  groupId: string
): Promise<Consumer> => {
  const consumer = getKafka(settings).consumer({ groupId });
  await consumer.connect();
  logger.info({ groupId }, "Kafka consumer connected");
  return consumer;
};

/** Publishes analysis jobs keyed by contract, so runs of one contract stay ordered. */
export const createJobPublisher =
  (settings: KafkaSettings) =>
  async (payload: AnalysisJobPayload): Promise<void> => {
    const producer = await getKafkaProducer(settings);
    await producer.send({
      topic: settings.topic,
      messages: [{ key: payload.contractId, value: JSON.stringify(payload) }],
    });
    logger.debug({ analysisId: payload.analysisId }, "Enqueued contract analysis");
  };

export const disconnectKafka = async (): Promise<void> => {
  if (producerInstance) {
    await producerInstance.disconnect();
    producerInstance = null;
    logger.info("Kafka producer disconnected");
  }
};

export default getKafka;

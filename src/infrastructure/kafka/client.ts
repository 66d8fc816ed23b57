import { Kafka, logLevel } from 'kafkajs';
import type { LogEntry } from 'kafkajs';
import type { Logger } from 'pino';

export interface KafkaClientOptions {
  clientId: string;
  brokers: string[];
}

/**
 * Builds the kafkajs client with its internal logging routed through pino.
 */
export function createKafka(options: KafkaClientOptions, log: Logger): Kafka {
  const kafkaLog = log.child({ component: 'kafkajs' });

  return new Kafka({
    clientId: options.clientId,
    brokers: options.brokers,
    logLevel: logLevel.INFO,
    logCreator: () => (entry: LogEntry) => {
      const { message, ...fields } = entry.log;
      const context = { namespace: entry.namespace, ...fields };
      switch (entry.level) {
        case logLevel.ERROR:
          kafkaLog.error(context, message);
          break;
        case logLevel.WARN:
          kafkaLog.warn(context, message);
          break;
        case logLevel.INFO:
          kafkaLog.info(context, message);
          break;
        default:
          kafkaLog.debug(context, message);
      }
    },
  });
}

import { WeatherReport } from './weather-service';

export interface KafkaTarget {
  broker: string;
  topic: string;
}

// Placeholder: no broker client is wired in yet, the report is only logged.
export const publishToKafka = (report: WeatherReport, { broker, topic }: KafkaTarget, verbose: boolean = false): void => {
  if (verbose) {
    console.log(`[kafka] would send data for ${report.locationId} to topic ${topic} at broker ${broker}`);
  }
  console.log(`[kafka] integration not implemented - data for ${report.locationId} would be sent to ${topic}`);
};

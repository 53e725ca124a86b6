import OpenAI from 'openai';
import { describeError } from './errors';
import { formatDayLabel } from './time';
import { WeatherReport } from './weather-service';
import { temperatureUnitLabel, windUnitLabel } from './weather';

export const MISSING_OPENAI_KEY_MESSAGE = 'Missing OPENAI_API_KEY environment variable';

export const SUMMARY_SYSTEM_PROMPT = 'You are a helpful and friendly weather forecaster writing short reports.';
export const SUMMARY_USER_PROMPT_PREFIX =
  'Based on the following structured weather data, write a 3-5 sentence friendly and clear weather summary:\n\n';

export interface SummaryMessage {
  role: 'system' | 'user';
  content: string;
}

export type CompletionRequester = (messages: SummaryMessage[]) => Promise<string | null>;

export const createOpenAiCompletionRequester = (apiKey: string, model: string): CompletionRequester => {
  const client = new OpenAI({ apiKey });
  return async (messages) => {
    const response = await client.chat.completions.create({ model, messages });
    return response.choices[0]?.message?.content ?? null;
  };
};

/** Plain-text digest fed to the summarizer. */
export const buildForecastText = (report: WeatherReport): string => {
  const unit = temperatureUnitLabel(report.units);
  const windUnit = windUnitLabel(report.units);
  const { current } = report;
  const lines = [
    `Location: ${report.locationName} (ZIP: ${report.locationId})`,
    `Now: ${current.temperature.toFixed(1)}${unit}, feels like ${current.feelsLike.toFixed(1)}${unit}, ${current.conditionText}`,
    `Humidity: ${current.humidity}%, Wind: ${current.windSpeed.toFixed(1)} ${windUnit}`,
  ];
  if (report.today) {
    lines.push(`Today: Min ${report.today.tempMin.toFixed(1)}${unit}, Max ${report.today.tempMax.toFixed(1)}${unit}, ${report.today.conditionText}`);
  }
  lines.push('7-Day Forecast:');
  report.forecast.forEach((day) => {
    lines.push(`${formatDayLabel(day.date)}: Min ${day.tempMin.toFixed(1)}${unit}, Max ${day.tempMax.toFixed(1)}${unit}, ${day.conditionText}`);
  });
  return `${lines.join('\n')}\n`;
};

interface SummarizeForecastOptions {
  apiKey: string | null | undefined;
  model: string;
  requester?: CompletionRequester;
}

/** Never throws: a missing key or failed call comes back as a placeholder string. */
export const summarizeForecast = async (forecastText: string, { apiKey, model, requester }: SummarizeForecastOptions): Promise<string> => {
  if (!apiKey) {
    return MISSING_OPENAI_KEY_MESSAGE;
  }

  try {
    const requestCompletion = requester ?? createOpenAiCompletionRequester(apiKey, model);
    const content = await requestCompletion([
      { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
      { role: 'user', content: `${SUMMARY_USER_PROMPT_PREFIX}${forecastText}` },
    ]);
    return content?.trim() || 'OpenAI API error: empty completion';
  } catch (error) {
    return `OpenAI API error: ${describeError(error)}`;
  }
};

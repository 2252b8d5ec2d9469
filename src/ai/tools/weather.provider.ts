import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { ToolOutput, ToolProvider } from './tool.types';
import { ToolInput } from '../rag/rag.types';
import { AssistantConfig } from '../../config/assistant.config';
import { isRecord, readNumber, readString } from '../../common/utils/guards';

export interface CurrentWeather {
  location: string;
  temperatureC: number;
  windKmh: number;
  observedAt: string | null;
}

export function parseCurrentWeather(body: unknown, location: string): CurrentWeather {
  const current = isRecord(body) ? body.current_weather : undefined;
  if (!isRecord(current)) {
    throw new Error('Unexpected Open-Meteo response: current_weather missing');
  }
  const temperatureC = readNumber(current, 'temperature');
  const windKmh = readNumber(current, 'windspeed');
  if (temperatureC === undefined || windKmh === undefined) {
    throw new Error('Unexpected Open-Meteo response: incomplete current_weather');
  }
  return {
    location,
    temperatureC,
    windKmh,
    observedAt: readString(current, 'time') ?? null,
  };
}

/** Current conditions where the portfolio owner is based (Open-Meteo, no key). */
@Injectable()
export class WeatherProvider implements ToolProvider {
  readonly id = 'weather.current';
  readonly description = 'Current weather at the portfolio owner\'s location';

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {}

  async invoke(_input: ToolInput, signal: AbortSignal): Promise<ToolOutput> {
    const { weatherLocation, weatherLatitude, weatherLongitude } =
      this.configService.getOrThrow<AssistantConfig>('assistant').tools;

    const response = await firstValueFrom(
      this.httpService.get<unknown>('https://api.open-meteo.com/v1/forecast', {
        params: {
          latitude: weatherLatitude,
          longitude: weatherLongitude,
          current_weather: true,
        },
        signal,
      }),
    );

    const weather = parseCurrentWeather(response.data, weatherLocation);
    return {
      data: weather,
      summary: `Current weather in ${weather.location}: ${weather.temperatureC}°C, wind ${weather.windKmh} km/h.`,
    };
  }
}

import { z } from 'zod';
import { defineFunction, type Tool } from '../types';
import { getJson, parseResponse, type QueryParams } from './http';
import { hasParams, nullable } from './params';

const OPENWEATHER_API_BASE = 'https://api.openweathermap.org';

export interface WeatherToolOptions {
  apiKey: string;
  baseUrl?: string;
}

export type Temperature = { celsius: number; fahrenheit: number };

export type WeatherReport = {
  location: { city: string; country: string | null; coordinates: { lat: number; lon: number } };
  weather: { main: string; description: string };
  temperature: { current: Temperature; feelsLike: Temperature; min: Temperature; max: Temperature };
  humidity: number;
  pressure: number;
  wind: { speedMs: number; directionDeg: number | null };
  visibilityM: number | null;
  cloudiness: number | null;
  observedAt: string;
};

const CurrentWeatherSchema = z.object({
  name: z.string().default(''),
  coord: z.object({ lat: z.number(), lon: z.number() }),
  weather: z.array(z.object({ main: z.string(), description: z.string() })).default([]),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    temp_min: z.number(),
    temp_max: z.number(),
    pressure: z.number(),
    humidity: z.number(),
  }),
  wind: z.object({ speed: z.number(), deg: nullable(z.number()) }).default({ speed: 0 }),
  visibility: nullable(z.number()),
  clouds: nullable(z.object({ all: z.number() })),
  sys: z.object({ country: nullable(z.string()) }).default({}),
  dt: z.number(),
});

const round1 = (value: number) => Math.round(value * 10) / 10;

/** OpenWeatherMap 以 metric 单位返回摄氏度，这里同时给出华氏度 */
export function toTemperature(celsius: number): Temperature {
  return { celsius: round1(celsius), fahrenheit: round1((celsius * 9) / 5 + 32) };
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, (char) => char.toUpperCase());
}

function toReport(body: unknown): WeatherReport {
  const data = parseResponse('weather', CurrentWeatherSchema, body);
  const condition = data.weather[0];
  return {
    location: {
      city: data.name || `${data.coord.lat},${data.coord.lon}`,
      country: data.sys.country,
      coordinates: { lat: data.coord.lat, lon: data.coord.lon },
    },
    weather: {
      main: condition?.main ?? 'Unknown',
      description: condition?.description ?? 'unknown',
    },
    temperature: {
      current: toTemperature(data.main.temp),
      feelsLike: toTemperature(data.main.feels_like),
      min: toTemperature(data.main.temp_min),
      max: toTemperature(data.main.temp_max),
    },
    humidity: data.main.humidity,
    pressure: data.main.pressure,
    wind: { speedMs: data.wind.speed, directionDeg: data.wind.deg },
    visibilityM: data.visibility,
    cloudiness: data.clouds?.all ?? null,
    observedAt: new Date(data.dt * 1000).toISOString(),
  };
}

export function summarizeWeather(report: WeatherReport): string {
  const { location, weather, temperature } = report;
  const place = location.country ? `${location.city}, ${location.country}` : location.city;
  return [
    `**${place}**`,
    `- Conditions: ${titleCase(weather.description)}`,
    `- Temperature: ${temperature.current.celsius}°C / ${temperature.current.fahrenheit}°F`,
    `- Humidity: ${report.humidity}%`,
    `- Wind: ${report.wind.speedMs} m/s`,
  ].join('\n');
}

export function createWeatherTool({ apiKey, baseUrl = OPENWEATHER_API_BASE }: WeatherToolOptions): Tool {
  const request = (params: QueryParams) =>
    getJson(`${baseUrl}/data/2.5/weather`, {
      tool: 'weather',
      params: { ...params, appid: apiKey, units: 'metric' },
    });

  const getCurrentWeather = defineFunction({
    name: 'get_current_weather',
    description: 'Get the current weather for a city',
    parameters: z.object({
      city: z.string().trim().min(1).describe('City name in English, optionally with a country code, e.g. "London,GB"'),
    }),
    handler: async ({ city }): Promise<WeatherReport> => {
      console.log(`[Weather] Getting current weather for: ${city}`);
      return toReport(await request({ q: city }));
    },
    summarize: summarizeWeather,
  });

  const getWeatherByCoordinates = defineFunction({
    name: 'get_weather_by_coordinates',
    description: 'Get the current weather for a latitude/longitude pair',
    parameters: z.object({
      lat: z.coerce.number().min(-90).max(90).describe('Latitude (-90 to 90)'),
      lon: z.coerce.number().min(-180).max(180).describe('Longitude (-180 to 180)'),
    }),
    handler: async ({ lat, lon }): Promise<WeatherReport> => {
      console.log(`[Weather] Getting current weather at: ${lat},${lon}`);
      return toReport(await request({ lat, lon }));
    },
    summarize: summarizeWeather,
  });

  return {
    name: 'weather',
    description: 'OpenWeatherMap integration for current weather conditions by city or coordinates',
    functions: [getCurrentWeather, getWeatherByCoordinates],
    inferFunction: (parameters) =>
      hasParams(parameters, 'lat', 'lon') ? 'get_weather_by_coordinates' : 'get_current_weather',
  };
}

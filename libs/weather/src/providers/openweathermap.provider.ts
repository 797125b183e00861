import { WeatherProviderError } from '@weatherscape/common';
import { WeatherProvider } from '../weather-provider.interface';
import { Coordinates, WeatherPayload, formatCoordinate, isWeatherPayload } from '../weather.types';

const DEFAULT_API_URL = 'https://api.openweathermap.org/data/2.5';
const DEFAULT_GEO_URL = 'https://api.openweathermap.org/geo/1.0';
const ZIP_COUNTRY = 'US';

export interface OpenWeatherMapOptions {
  apiKey?: string;
  apiUrl?: string;
  geoUrl?: string;
}

export class OpenWeatherMapProvider implements WeatherProvider {
  private readonly apiKey: string | undefined;
  private readonly apiUrl: string;
  private readonly geoUrl: string;

  constructor(options: OpenWeatherMapOptions) {
    this.apiKey = options.apiKey || undefined;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.geoUrl = options.geoUrl ?? DEFAULT_GEO_URL;
  }

  isConfigured(): boolean {
    return this.apiKey !== undefined;
  }

  async geocode(zip: string): Promise<Coordinates> {
    const url = new URL(`${this.geoUrl}/zip`);
    url.searchParams.set('zip', `${zip},${ZIP_COUNTRY}`);

    const data = await this.request(url, 'Geocoding');
    const { lat, lon } = data;

    if (typeof lat !== 'number' || typeof lon !== 'number') {
      throw new WeatherProviderError(`Geocoding response for ${zip} has no coordinates`);
    }
    return { lat, lon };
  }

  async currentWeather(coords: Coordinates): Promise<WeatherPayload> {
    return this.request(this.weatherUrl('weather', coords), 'Current weather');
  }

  async forecast(coords: Coordinates): Promise<WeatherPayload> {
    return this.request(this.weatherUrl('forecast', coords), 'Forecast');
  }

  /**
   * Coordinates always go out with four decimals so the same location maps
   * to the same request.
   */
  private weatherUrl(endpoint: 'weather' | 'forecast', coords: Coordinates): URL {
    const url = new URL(`${this.apiUrl}/${endpoint}`);
    url.searchParams.set('lat', formatCoordinate(coords.lat));
    url.searchParams.set('lon', formatCoordinate(coords.lon));
    url.searchParams.set('mode', 'json');
    return url;
  }

  private async request(url: URL, label: string): Promise<WeatherPayload> {
    if (!this.apiKey) {
      throw new WeatherProviderError('OpenWeatherMap API key is not configured');
    }
    url.searchParams.set('appid', this.apiKey);

    let response: Response;
    try {
      response = await fetch(url.toString());
    } catch (error) {
      throw new WeatherProviderError(`${label} request failed`, undefined, { cause: error });
    }

    if (response.status !== 200) {
      throw new WeatherProviderError(`${label} API returned status ${response.status}`, response.status);
    }

    const data: unknown = await response.json();
    if (!isWeatherPayload(data)) {
      throw new WeatherProviderError(`${label} API returned a non-object payload`);
    }
    return data;
  }
}

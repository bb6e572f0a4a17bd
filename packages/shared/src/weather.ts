// Space Weather Types

export const WEATHER_CATEGORIES = [
  'GEOMAGNETIC_STORM',
  'SOLAR_FLARE',
  'CORONAL_MASS_EJECTION',
  'SOLAR_ENERGETIC_PARTICLE',
  'RADIATION_BELT_ENHANCEMENT',
] as const;

export type WeatherCategory = typeof WEATHER_CATEGORIES[number];

export interface WeatherEvent {
  eventId: string;
  category: WeatherCategory;
  timestamp: number;
  magnitude?: number; // flare: peak X-ray flux W/m², storm: max Kp
}

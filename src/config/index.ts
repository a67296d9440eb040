import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
dotenv.config();

interface Config {
  port: number;
  clientUrl: string;
  /** Optional; raises the geocoder's free quota when set */
  arcgisApiKey: string;
  geocodeUrl: string;
  /** Layer 0 of Clean_Street_Routes (centerlines joined with sweep schedule) */
  routesUrl: string;
  sweepMapUrl: string;
  holidaysFile: string;
  /** Geocoder candidates scoring below this are treated as not found */
  minGeocodeScore: number;
  upstreamTimeoutMs: number;
}

const config: Config = {
  port: Number(process.env.PORT) || 5001,
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5173',
  arcgisApiKey: process.env.ARCGIS_API_KEY || '',
  geocodeUrl:
    process.env.GEOCODE_URL ||
    'https://geocode.arcgis.com/arcgis/rest/services/World/GeocodeServer/findAddressCandidates',
  routesUrl:
    process.env.ROUTES_URL ||
    'https://services5.arcgis.com/7nsPwEMP38bSkCjy/arcgis/rest/services/Clean_Street_Routes/FeatureServer/0/query',
  sweepMapUrl:
    process.env.SWEEP_MAP_URL ||
    'https://labss.maps.arcgis.com/apps/dashboards/ad01106434a443a69924c54f1e8edbf7',
  holidaysFile:
    process.env.HOLIDAYS_FILE ||
    fileURLToPath(new URL('../../data/holidays.json', import.meta.url)),
  minGeocodeScore: Number(process.env.MIN_GEOCODE_SCORE) || 70,
  upstreamTimeoutMs: Number(process.env.UPSTREAM_TIMEOUT_MS) || 15_000,
};

export default config;

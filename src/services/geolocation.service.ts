/**
 * Geolocation Service
 *
 * Resolves an IP address to a location through an ip-api compatible JSON
 * endpoint. Loopback and private ranges are answered locally. Any failure,
 * including a timeout, resolves to the Unknown location.
 *
 * Also hosts the distance and speed helpers used for impossible-travel checks.
 */

import { ENGINE_CONFIG } from '../config/engine.config';
import { GeoLocation, UNKNOWN_LOCATION } from '../models/auth-context.model';
import { ExternalServiceTimeout, errorMessage } from '../utils/errors';
import { fetchWithTimeout } from '../utils/timeout';
import { SecurityEventTypes, logSecurityEvent } from './security-logger.service';

const EARTH_RADIUS_KM = 6371;

export const LOCALHOST_LOCATION: Readonly<GeoLocation> = Object.freeze({
  countryCode: 'XX',
  city: 'Localhost',
  display: 'Localhost'
});

export const PRIVATE_NETWORK_LOCATION: Readonly<GeoLocation> = Object.freeze({
  countryCode: 'XX',
  city: 'Local Network',
  display: 'Local Network'
});

/**
 * Distance between two points on the Earth's surface (Haversine), in km
 */
export function calculateHaversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const toRad = (deg: number) => deg * (Math.PI / 180);

  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) *
    Math.sin(dLon / 2) * Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

/**
 * Travel speed in km/h. Zero or negative elapsed time yields Infinity.
 */
export function calculateSpeed(distanceKm: number, elapsedHours: number): number {
  if (elapsedHours <= 0) return Infinity;
  return distanceKm / elapsedHours;
}

export function isLoopbackAddress(ip: string): boolean {
  return ip === 'localhost' || ip === '::1' || ip.startsWith('127.');
}

export function isPrivateAddress(ip: string): boolean {
  if (ip.startsWith('10.') || ip.startsWith('192.168.')) return true;
  const match = /^172\.(\d{1,3})\./.exec(ip);
  if (match) {
    const second = Number(match[1]);
    return second >= 16 && second <= 31;
  }
  return ip.toLowerCase().startsWith('fc') || ip.toLowerCase().startsWith('fd');
}

/**
 * Response shape of the lookup endpoint (only the fields we request)
 */
interface LookupResponse {
  status?: string;
  message?: string;
  country?: string;
  countryCode?: string;
  city?: string;
  lat?: number;
  lon?: number;
  proxy?: boolean;
  hosting?: boolean;
}

function isLookupResponse(value: unknown): value is LookupResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface GeolocationServiceConfig {
  /** Base URL; the IP is appended as a path segment */
  endpoint?: string;
  /** Request timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

export class GeolocationService {
  private readonly config: Required<GeolocationServiceConfig>;

  constructor(config: GeolocationServiceConfig = {}) {
    this.config = {
      endpoint: ENGINE_CONFIG.geolocation.endpoint,
      timeoutMs: ENGINE_CONFIG.geolocation.timeoutMs,
      ...config
    };
  }

  /**
   * Resolve an IP address. Never rejects.
   */
  async lookup(ipAddress: string): Promise<GeoLocation> {
    if (!ipAddress) return { ...UNKNOWN_LOCATION };
    if (isLoopbackAddress(ipAddress)) return { ...LOCALHOST_LOCATION };
    if (isPrivateAddress(ipAddress)) return { ...PRIVATE_NETWORK_LOCATION };

    try {
      return await this.fetchLocation(ipAddress);
    } catch (error) {
      const timedOut = error instanceof ExternalServiceTimeout;
      logSecurityEvent({
        event_type: timedOut
          ? SecurityEventTypes.EXTERNAL_SERVICE_TIMEOUT
          : SecurityEventTypes.EVALUATION_DEGRADED,
        ip_address: ipAddress,
        details: { service: 'geolocation', error: errorMessage(error) }
      });
      return { ...UNKNOWN_LOCATION };
    }
  }

  private async fetchLocation(ipAddress: string): Promise<GeoLocation> {
    const url = `${this.config.endpoint}/${encodeURIComponent(ipAddress)}` +
      '?fields=status,message,country,countryCode,city,lat,lon,proxy,hosting';

    const response = await fetchWithTimeout(
      'geolocation',
      url,
      { headers: { Accept: 'application/json' } },
      this.config.timeoutMs
    );

    if (!response.ok) {
      throw new Error(`Geolocation API returned status ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!isLookupResponse(body) || body.status !== 'success') {
      const reason = isLookupResponse(body) && body.message ? body.message : 'unexpected response';
      throw new Error(`Geolocation lookup failed: ${reason}`);
    }

    const city = body.city || 'Unknown';
    const country = body.country || 'Unknown';

    return {
      countryCode: body.countryCode || UNKNOWN_LOCATION.countryCode,
      city,
      display: `${city}, ${country}`,
      latitude: typeof body.lat === 'number' ? body.lat : undefined,
      longitude: typeof body.lon === 'number' ? body.lon : undefined,
      isVpn: body.proxy === true || body.hosting === true
    };
  }
}

let defaultGeolocationService: GeolocationService | null = null;

export function getGeolocationService(): GeolocationService {
  if (!defaultGeolocationService) {
    defaultGeolocationService = new GeolocationService();
  }
  return defaultGeolocationService;
}

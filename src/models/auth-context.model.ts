/**
 * AuthContext Model
 *
 * Facts about one authentication attempt, assembled before scoring. A context
 * is frozen on construction and never changes during an evaluation.
 */

export type DeviceType = 'mobile' | 'desktop';

export const DEVICE_TYPES: readonly DeviceType[] = ['mobile', 'desktop'];

/**
 * Parsed user-agent signature
 */
export interface DeviceSignature {
  browser: string;
  os: string;
  deviceType: DeviceType;
}

/**
 * Resolved location for an IP address
 */
export interface GeoLocation {
  countryCode: string;          // ISO 3166-1 alpha-2, 'XX' when unknown
  city: string;
  display: string;              // "City, Country" or a fallback label
  latitude?: number;
  longitude?: number;
  isTor?: boolean;
  isVpn?: boolean;
}

export const UNKNOWN_LOCATION: Readonly<GeoLocation> = Object.freeze({
  countryCode: 'XX',
  city: 'Unknown',
  display: 'Unknown'
});

export interface AuthContext {
  readonly userId: string;
  readonly ipAddress: string;
  readonly userAgent: string;
  readonly device: Readonly<DeviceSignature>;
  readonly location: Readonly<GeoLocation>;
  readonly timestamp: Date;
  readonly isBusinessHours: boolean;
}

/**
 * Business hours are 08:00–18:00 UTC inclusive, Monday to Friday.
 */
export function isWithinBusinessHours(
  timestamp: Date,
  startHour: number,
  endHour: number
): boolean {
  const seconds = timestamp.getUTCHours() * 3600
    + timestamp.getUTCMinutes() * 60
    + timestamp.getUTCSeconds();
  return seconds >= startHour * 3600 && seconds <= endHour * 3600;
}

export function isWeekday(timestamp: Date): boolean {
  const day = timestamp.getUTCDay();
  return day >= 1 && day <= 5;
}

export function freezeContext(context: AuthContext): AuthContext {
  return Object.freeze({
    ...context,
    device: Object.freeze({ ...context.device }),
    location: Object.freeze({ ...context.location })
  });
}

/**
 * Device Fingerprinting Service
 *
 * A device is identified by browser family, OS family and the first 50
 * characters of its user agent. The same inputs always give the same
 * fingerprint, which is what the registry is keyed on.
 */

import crypto from 'crypto';
import { ENGINE_CONFIG } from '../config/engine.config';
import { DeviceSignature } from '../models/auth-context.model';

export function buildDeviceFingerprint(device: DeviceSignature, userAgent: string): string {
  const prefix = (userAgent || '').slice(0, ENGINE_CONFIG.risk.fingerprintUaPrefixLength);
  return `${device.browser}_${device.os}_${prefix}`;
}

/**
 * Fixed-length form of the fingerprint for storage keys
 */
export function hashDeviceFingerprint(fingerprint: string): string {
  return crypto.createHash('sha256').update(fingerprint).digest('hex');
}

export function generateDeviceName(device: DeviceSignature): string {
  const browser = device.browser === 'Other' ? 'Unknown Browser' : device.browser;
  const os = device.os === 'Other' ? 'Unknown OS' : device.os;
  return `${browser} on ${os}`;
}

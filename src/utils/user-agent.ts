/**
 * User-agent parsing
 *
 * Substring checks are enough here: the result only feeds device
 * fingerprints and the mobile/desktop split.
 */

import { DeviceSignature, DeviceType } from '../models/auth-context.model';

const MOBILE_MARKERS = ['mobile', 'android', 'iphone', 'ipod', 'windows phone', 'blackberry'];

export function detectBrowser(ua: string): string {
  if (ua.includes('Edg/') || ua.includes('Edge/')) return 'Edge';
  if (ua.includes('OPR/') || ua.includes('Opera')) return 'Opera';
  if (ua.includes('Firefox/')) return 'Firefox';
  if (ua.includes('Chrome/') || ua.includes('CriOS/')) return 'Chrome';
  if (ua.includes('Safari/')) return 'Safari';
  return 'Other';
}

export function detectOS(ua: string): string {
  const lower = ua.toLowerCase();
  if (lower.includes('iphone') || lower.includes('ipad') || lower.includes('ipod')) return 'iOS';
  if (lower.includes('android')) return 'Android';
  if (lower.includes('windows')) return 'Windows';
  if (lower.includes('mac os') || lower.includes('macintosh')) return 'Mac OS X';
  if (lower.includes('linux')) return 'Linux';
  return 'Other';
}

export function detectDeviceType(ua: string): DeviceType {
  const lower = ua.toLowerCase();
  if (lower.includes('ipad') || lower.includes('tablet')) return 'desktop';
  return MOBILE_MARKERS.some(marker => lower.includes(marker)) ? 'mobile' : 'desktop';
}

export function parseUserAgent(userAgent: string): DeviceSignature {
  const ua = userAgent || '';
  return {
    browser: detectBrowser(ua),
    os: detectOS(ua),
    deviceType: detectDeviceType(ua)
  };
}

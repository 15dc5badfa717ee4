/**
 * Session Model - the engine's view of a live session
 *
 * Sessions are created by the session lifecycle service; the engine reads
 * them, updates their risk fields and revokes them.
 */

export interface SessionLocation {
  display: string;
  country_code?: string;
  latitude?: number;
  longitude?: number;
}

export interface Session {
  id: string;
  user_id: string;
  risk_score: number;
  ip_address: string;
  user_agent: string;
  location?: SessionLocation;
  created_at: string;
  expires_at: string;
  last_reevaluated_at?: string;
  next_reevaluation_at?: string;
  revoked: boolean;
  revoked_at?: string;
  revoke_reason?: string;
}

export interface SessionRevocation {
  reason: string;
  revoked_at: string;
}

/**
 * Risk-relevant fields written back after a reevaluation. With `revoke` set
 * the same write also revokes the session.
 */
export interface SessionRiskUpdate {
  risk_score: number;
  ip_address: string;
  user_agent: string;
  location?: SessionLocation;
  last_reevaluated_at: string;
  next_reevaluation_at: string;
  revoke?: SessionRevocation;
}

export function isSessionExpired(session: Pick<Session, 'expires_at'>, now: Date = new Date()): boolean {
  return new Date(session.expires_at).getTime() <= now.getTime();
}

export function isSessionActive(session: Pick<Session, 'expires_at' | 'revoked'>, now: Date = new Date()): boolean {
  return !session.revoked && !isSessionExpired(session, now);
}

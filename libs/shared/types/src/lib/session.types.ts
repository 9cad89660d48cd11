/**
 * Session Types
 */

/**
 * Closed and expired sessions leave the table, so a snapshot is always active
 */
export enum SessionStatus {
  ACTIVE = 'active',
}

/**
 * Read-only view of a session handed out by the session manager
 */
export interface SessionSnapshot {
  sessionId: string;
  status: SessionStatus;
  createdAt: string;
  lastActivity: string;
  expiresAt: string;
  expiryMs: number;
}

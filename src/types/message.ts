/**
 * Permission groups a func may require and a sender may hold.
 *
 * ADMIN senders may trigger USER funcs; USER senders may not trigger ADMIN funcs.
 */
export const PermissionGroup = {
  USER: 'user',
  ADMIN: 'admin',
} as const;

export type PermissionGroup = (typeof PermissionGroup)[keyof typeof PermissionGroup];

const PERMISSION_RANK: Record<PermissionGroup, number> = {
  user: 0,
  admin: 1,
};

/**
 * Whether a sender holding `held` may trigger a func requiring `required`.
 */
export function hasPermission(held: PermissionGroup, required: PermissionGroup): boolean {
  return PERMISSION_RANK[held] >= PERMISSION_RANK[required];
}

/**
 * Who sent a message.
 */
export interface MessageSender {
  id: string;
  permission: PermissionGroup;
}

/**
 * An incoming chat message as seen by registered funcs.
 *
 * The transport decides everything else about the event; the core only
 * reads the raw text and the sender's permission.
 */
export interface IncomingMessage {
  rawMessage: string;
  sender: MessageSender;
  /** Transport-specific payload, passed through untouched */
  data?: Record<string, unknown>;
}

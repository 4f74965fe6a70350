/**
 * MCP method names understood by the dispatcher
 * @internal
 */

/**
 * Request methods that need a negotiated session
 */
export const CAPABILITY_METHODS = [
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/read',
  'resources/templates/list',
  'prompts/list',
  'prompts/get',
  'logging/setLevel',
] as const;

/**
 * Request methods available in any open session
 */
export const SESSION_METHODS = ['initialize', 'ping'] as const;

/**
 * Notifications with side effects
 */
export const NOTIFICATION_METHODS = [
  'notifications/initialized',
  'initialized',
  'notifications/cancelled',
  'logging/setLevel',
] as const;

export type CapabilityMethod = (typeof CAPABILITY_METHODS)[number];
export type SessionMethod = (typeof SESSION_METHODS)[number];
export type RequestMethod = SessionMethod | CapabilityMethod;
export type NotificationMethod = (typeof NOTIFICATION_METHODS)[number];

/**
 * MCP method names
 */
export type MCPMethod = RequestMethod | NotificationMethod;

export function isCapabilityMethod(method: string): method is CapabilityMethod {
  return (CAPABILITY_METHODS as readonly string[]).includes(method);
}

export function isRequestMethod(method: string): method is RequestMethod {
  return (SESSION_METHODS as readonly string[]).includes(method) || isCapabilityMethod(method);
}

export function isNotificationMethod(method: string): method is NotificationMethod {
  return (NOTIFICATION_METHODS as readonly string[]).includes(method);
}

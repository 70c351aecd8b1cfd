/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * - User roles and package lifecycle states
 * - HTTP status codes and machine-readable error codes
 * - WebSocket close codes used by the realtime channel
 * =============================================================================
 */

// =============================================================================
// USER ROLES
// =============================================================================

/**
 * User roles in the system
 */
export enum UserRole {
  ADMIN = 'admin',
  COURIER = 'courier',
  SENDER = 'sender',
  RECIPIENT = 'recipient'
}

export const USER_ROLES: readonly UserRole[] = [
  UserRole.ADMIN,
  UserRole.COURIER,
  UserRole.SENDER,
  UserRole.RECIPIENT
];

// =============================================================================
// PACKAGE STATUS
// =============================================================================

/**
 * Package lifecycle states
 */
export enum PackageStatus {
  CREATED = 'created',           // Registered by sender, waiting for courier
  ASSIGNED = 'assigned',         // Courier assigned
  PICKED_UP = 'picked_up',       // Courier has the parcel
  IN_TRANSIT = 'in_transit',     // On the way to recipient
  DELIVERED = 'delivered',       // Handed over
  FAILED = 'failed',             // Delivery attempt failed
  CANCELLED = 'cancelled'        // Cancelled before pickup
}

/**
 * Allowed status transitions
 */
export const PACKAGE_STATUS_TRANSITIONS: Record<PackageStatus, PackageStatus[]> = {
  [PackageStatus.CREATED]: [PackageStatus.ASSIGNED, PackageStatus.CANCELLED],
  [PackageStatus.ASSIGNED]: [PackageStatus.PICKED_UP, PackageStatus.CANCELLED],
  [PackageStatus.PICKED_UP]: [PackageStatus.IN_TRANSIT, PackageStatus.FAILED],
  [PackageStatus.IN_TRANSIT]: [PackageStatus.DELIVERED, PackageStatus.FAILED],
  [PackageStatus.DELIVERED]: [],
  [PackageStatus.FAILED]: [],
  [PackageStatus.CANCELLED]: []
};

/**
 * States in which the courier is expected to report location
 */
export const TRACKABLE_PACKAGE_STATUSES: readonly PackageStatus[] = [
  PackageStatus.ASSIGNED,
  PackageStatus.PICKED_UP,
  PackageStatus.IN_TRANSIT
];

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

// =============================================================================
// WEBSOCKET CLOSE CODES (RFC 6455)
// =============================================================================

export const WS_CLOSE_CODES = {
  NORMAL: 1000,            // Client- or server-initiated clean shutdown
  GOING_AWAY: 1001,        // Server shutting down
  PROTOCOL_ERROR: 1002,    // Malformed inbound frame
  POLICY_VIOLATION: 1008,  // Registration refused / connection limit
  INTERNAL_ERROR: 1011,    // Socket error on the server side
  TRY_AGAIN_LATER: 1013    // Outbound buffer overflow (slow consumer)
} as const;

export type WsCloseCode = typeof WS_CLOSE_CODES[keyof typeof WS_CLOSE_CODES];

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 1xxx: Authentication & Authorization
 * - 2xxx: Validation errors
 * - 3xxx: Package / delivery business logic
 * - 7xxx: Realtime channel
 * - 9xxx: System errors
 */
export enum ErrorCode {
  AUTH_TOKEN_EXPIRED = 'AUTH_1002',
  AUTH_TOKEN_INVALID = 'AUTH_1003',
  AUTH_UNAUTHORIZED_ACCESS = 'AUTH_1009',
  AUTH_FORBIDDEN = 'AUTH_1010',

  VALIDATION_ERROR = 'VAL_2001',

  PACKAGE_NOT_FOUND = 'PKG_3001',
  PACKAGE_INVALID_STATUS = 'PKG_3002',
  PACKAGE_ALREADY_ASSIGNED = 'PKG_3003',
  DELIVERY_NOT_FOUND = 'PKG_3101',
  DELIVERY_NOT_TRACKABLE = 'PKG_3102',
  COURIER_NOT_ELIGIBLE = 'PKG_3201',

  WS_AUTH_REJECTED = 'WS_7001',
  WS_PROTOCOL_ERROR = 'WS_7002',
  WS_BUFFER_OVERFLOW = 'WS_7003',

  INTERNAL_ERROR = 'SYS_9001',
  NOT_FOUND = 'SYS_9004'
}

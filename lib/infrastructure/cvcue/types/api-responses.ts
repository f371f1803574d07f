/**
 * CV-CUE API Response Types
 *
 * Only the fields this client reads are typed; records are otherwise passed
 * through untouched.
 */

/**
 * Response body of POST /session
 */
export interface LoginResponse {
  [key: string]: unknown;
}

/**
 * Managed device (access point) record. The API returns many more fields
 * than the ones named here.
 */
export interface ManagedDevice {
  boxid?: number;
  name?: string;
  macaddress?: string;
  model?: string;
  active?: boolean;
  ipaddress?: string;
  [key: string]: unknown;
}

/**
 * One page of GET /manageddevices/aps
 */
export interface ManagedDevicesPage {
  managedDevices?: ManagedDevice[];
  totalCount?: number; // only when totalcountrequired=true
  pagingSessionId?: string;
}

/**
 * SSH connection type definitions
 */

/**
 * Base SSH connection information
 */
export interface SSHConnectionInfo {
  host: string;
  port: number;
  user: string;
}

/**
 * SSH connection with password authentication
 */
export interface SSHPasswordConnection extends SSHConnectionInfo {
  password: string;
}

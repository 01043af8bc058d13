/**
 * Services barrel export
 *
 * Admission-control layer: each service returns values rather than
 * throwing, so commands can render the message to an operator.
 */

// Administrator and SSH credential checks
export * from './credential-service';

// Topology validation against the role schema
export * from './topology-service';

// SSH reachability probe
export * from './probe-service';

// Single-flight deployment lock
export * from './lock-service';

// External deploy call
export * from './deploy-service';

// Admission pipeline
export * from './gate-service';

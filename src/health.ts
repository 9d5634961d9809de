// src/health.ts

/**
 * Health status of a component.
 */
export type HealthStatus = "healthy" | "degraded" | "unhealthy";

/**
 * Health check result for a single component.
 */
export interface ComponentHealth {
  /** Name of the component */
  name: string;
  /** Health status */
  status: HealthStatus;
  /** Optional message providing details */
  message?: string;
  /** Optional metrics or details */
  details?: Record<string, unknown>;
}

/**
 * Interface for components that support health checks.
 */
export interface HealthCheckable {
  /**
   * Returns the health status of this component.
   */
  getHealth(): ComponentHealth;
}

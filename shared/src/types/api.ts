/**
 * API Response and Error Types
 */

export interface ApiResponse<T> {
  data: T;
  total?: number;
}

export interface ApiError {
  error: string;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp?: string;
}

export interface ValidationError extends ApiError {
  error: 'Validation Error';
  validationErrors: FieldError[];
}

export interface FieldError {
  field: string;
  message: string;
  code?: string;
}

// Health check types
export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  activeHunts: number;
  checks: HealthCheck[];
}

export interface HealthCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  latency?: number;
  message?: string;
}

export interface HealthStatus {
  status: "healthy";
  service: string;
  timestamp: string;
}

export interface ServiceInfo {
  name: string;
  version: string;
  description: string;
}

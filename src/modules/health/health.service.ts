import { sequelize } from '../../config/database.js';
import env from '../../config/env.js';
import logger from '../../config/logger.js';
import { isSessionTimeoutSchedulerRunning } from '../negotiation/scheduler/sessionTimeout.js';

export type HealthState = 'healthy' | 'unhealthy' | 'degraded';

export interface ServiceStatus {
  name: string;
  status: HealthState;
  latency: number;
  message: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthState;
  timestamp: string;
  version: string;
  uptime: number;
  environment: string;
  services: ServiceStatus[];
}

export interface HealthProbes {
  database: () => Promise<void>;
  timeoutScheduler: () => boolean;
}

export interface HealthService {
  getHealthReport(): Promise<HealthReport>;
  getSimpleHealth(): Promise<{ status: string; message: string }>;
}

const startTime = Date.now();

const defaultProbes: HealthProbes = {
  database: () => sequelize.authenticate(),
  timeoutScheduler: isSessionTimeoutSchedulerRunning,
};

export function createHealthService(probes: HealthProbes = defaultProbes): HealthService {
  /**
   * Check PostgreSQL database connection
   */
  const checkDatabase = async (): Promise<ServiceStatus> => {
    const start = Date.now();
    try {
      await probes.database();
      return {
        name: 'database',
        status: 'healthy',
        latency: Date.now() - start,
        message: 'Connected to PostgreSQL',
        details: {
          host: env.database.host,
          database: env.database.name,
          dialect: 'postgres',
        },
      };
    } catch (error) {
      logger.error('Database health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        name: 'database',
        status: 'unhealthy',
        latency: Date.now() - start,
        message: error instanceof Error ? error.message : 'Database connection failed',
      };
    }
  };

  const checkTimeoutScheduler = (): ServiceStatus => {
    if (!env.negotiation.timeoutSweepEnabled) {
      return {
        name: 'session-timeout',
        status: 'healthy',
        latency: 0,
        message: 'Session timeout sweep disabled',
      };
    }
    const running = probes.timeoutScheduler();
    return {
      name: 'session-timeout',
      status: running ? 'healthy' : 'degraded',
      latency: 0,
      message: running ? 'Session timeout sweep scheduled' : 'Session timeout sweep not running',
      details: {
        cron: env.negotiation.timeoutSweepCron,
        timeoutMinutes: env.negotiation.sessionTimeoutMinutes,
      },
    };
  };

  /**
   * Get comprehensive health report for all services
   */
  const getHealthReport = async (): Promise<HealthReport> => {
    const services = [await checkDatabase(), checkTimeoutScheduler()];

    // Database is critical - if it's down, whole system is unhealthy
    const dbStatus = services.find((s) => s.name === 'database');
    let overallStatus: HealthState;
    if (dbStatus?.status === 'unhealthy') {
      overallStatus = 'unhealthy';
    } else if (services.some((s) => s.status !== 'healthy')) {
      overallStatus = 'degraded';
    } else {
      overallStatus = 'healthy';
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      environment: env.nodeEnv,
      services,
    };
  };

  /**
   * Get simple health status (for load balancers)
   */
  const getSimpleHealth = async (): Promise<{ status: string; message: string }> => {
    try {
      await probes.database();
      return { status: 'ok', message: 'Rate negotiation API is running' };
    } catch {
      return { status: 'error', message: 'Database connection failed' };
    }
  };

  return { getHealthReport, getSimpleHealth };
}

/**
 * Gateway - Health Monitor
 *
 * Liveness of the gateway process plus the provider and service health
 * tracked by the fallback HealthChecker.
 */

import type { HealthChecker, HealthReport, OverallStatus } from '@verigate/fallback';
import type { CreditLedger } from '@verigate/ledger';
import type { ServiceRegistry } from '../pipeline/service-registry.js';
import type { UsageLogger } from '../pipeline/usage-logger.js';

export const VERSION = '1.0.0';

export interface Liveness {
  status: 'ok';
  uptime: number;
  version: string;
}

export interface GatewayHealthReport {
  status: OverallStatus;
  uptime: number;
  providers: HealthReport['providers'];
  services: HealthReport['services'];
  lastProviderCheck: string | null;
  pendingReservations: number;
  owedRefunds: number;
  usageLogFailures: number;
}

export class HealthMonitor {
  private readonly startTime = Date.now();

  constructor(
    private readonly checker: HealthChecker,
    private readonly services: ServiceRegistry,
    private readonly ledger: CreditLedger,
    private readonly usage: UsageLogger,
  ) {}

  /**
   * Quick liveness check - just returns gateway status.
   */
  getLiveness(): Liveness {
    return {
      status: 'ok',
      uptime: this.uptime(),
      version: VERSION,
    };
  }

  /**
   * Provider / service report from the latest cached checks.
   */
  getReport(): GatewayHealthReport {
    const report = this.checker.getReport(this.services.list());
    return {
      status: report.overallStatus,
      uptime: this.uptime(),
      providers: report.providers,
      services: report.services,
      lastProviderCheck: report.lastFullCheck ? report.lastFullCheck.toISOString() : null,
      pendingReservations: this.ledger.pendingCount,
      owedRefunds: this.ledger.owedCount,
      usageLogFailures: this.usage.failedWrites,
    };
  }

  /**
   * Ping every provider now, then report.
   */
  async check(): Promise<GatewayHealthReport> {
    await this.checker.checkAll();
    return this.getReport();
  }

  private uptime(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }
}

import { Controller, Get, Logger } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import { BusinessException } from '@common/exceptions/business-exceptions';
import { CorrelationId } from '@common/decorators/correlation-id.decorator';
import { PostalRecordRepository } from '../repositories/postal-record.repository';
import { ErrorResponseDto } from '../dto/error-response.dto';

interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
}

interface ReadinessResponse extends HealthResponse {
  dataset: {
    records: number;
  };
}

type MetricsResponse = HealthCheckResult & {
  uptime: number;
  process: { pid: number; nodeVersion: string };
  timestamp: string;
};

const HEAP_THRESHOLD_BYTES = 512 * 1024 * 1024;
const RSS_THRESHOLD_BYTES = 1024 * 1024 * 1024;

/**
 * Probes for the container orchestrator. Nothing is called over the network
 * at runtime, so readiness only asks the repository for a non-empty dataset.
 */
@ApiTags('Health')
@Controller('api/health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);
  private readonly startTime = Date.now();

  constructor(
    private readonly repository: PostalRecordRepository,
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Service status, version and uptime' })
  @ApiResponse({ status: 200, description: 'Service is running' })
  getHealth(): HealthResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: this.uptimeSeconds(),
      version: process.env.npm_package_version ?? 'unknown',
      environment: process.env.NODE_ENV ?? 'development',
    };
  }

  @Get('ready')
  @ApiOperation({
    summary: 'Readiness probe',
    description: 'Ready when the postal dataset holds at least one record',
  })
  @ApiResponse({ status: 200, description: 'Dataset loaded' })
  @ApiResponse({ status: 503, description: 'Postal dataset is empty', type: ErrorResponseDto })
  async getReadiness(@CorrelationId() correlationId: string): Promise<ReadinessResponse> {
    const records = await this.repository.count();

    if (records === 0) {
      this.logger.warn('Readiness check failed: postal dataset is empty', { correlationId });
      throw new BusinessException({
        errorCode: 'DATASET_UNAVAILABLE',
        message: 'Postal dataset is empty',
        correlationId,
        source: 'POSTAL_DATASET',
      });
    }

    return {
      ...this.getHealth(),
      dataset: { records },
    };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Process is up' })
  getLiveness(): { status: 'ok'; timestamp: string } {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  @Get('metrics')
  @HealthCheck()
  @ApiOperation({ summary: 'Heap and RSS usage checked by Terminus indicators' })
  @ApiResponse({ status: 200, description: 'Memory within limits' })
  async getMetrics(): Promise<MetricsResponse> {
    const healthCheckResult = await this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_THRESHOLD_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_THRESHOLD_BYTES),
    ]);

    return {
      ...healthCheckResult,
      uptime: this.uptimeSeconds(),
      process: { pid: process.pid, nodeVersion: process.version },
      timestamp: new Date().toISOString(),
    };
  }

  private uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }
}

import { Controller, Get, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthResponseDto } from './health.dto';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * GET /health
   */
  @Get()
  @ApiOperation({ summary: 'Health check', description: 'Service status, server time and version' })
  @ApiResponse({ status: 200, description: 'Service is healthy', type: HealthResponseDto })
  check(): HealthResponseDto {
    this.logger.debug('Health check requested');

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: this.configService.get<string>('APP_VERSION', '1.0.0'),
      message: 'Service is running',
    };
  }
}

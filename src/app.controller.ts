import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'cost-basis-ledger',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Cost-Basis Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        imports: '/portfolio/imports',
        prices: '/portfolio/prices',
        holdings: '/portfolio/holdings',
        disposals: '/portfolio/disposals',
        summary: '/portfolio/summary',
        transactions: '/portfolio/transactions',
        quotes: '/portfolio/quotes',
      },
    };
  }
}

import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should report the service as healthy', () => {
    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.service).toBe('cost-basis-ledger');
    expect(health.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should list the import endpoint', () => {
    expect(controller.getRoot().endpoints.imports).toBe('/portfolio/imports');
  });
});

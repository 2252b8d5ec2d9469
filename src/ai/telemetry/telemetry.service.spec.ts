import { Test, TestingModule } from '@nestjs/testing';
import { TelemetryService } from './telemetry.service';

describe('TelemetryService', () => {
  let service: TelemetryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TelemetryService],
    }).compile();

    service = module.get<TelemetryService>(TelemetryService);
  });

  it('should count events by name', () => {
    service.recordEvent('retry', { action: 'widen_context' });
    service.recordEvent('retry');
    service.recordEvent('fallback');

    expect(service.snapshot().events).toEqual({ retry: 2, fallback: 1 });
  });

  it('should aggregate latencies per stage', () => {
    service.recordLatency('respond', 100);
    service.recordLatency('respond', 50);
    service.recordLatency('respond', 25);

    expect(service.snapshot().latencies.respond).toEqual({
      count: 3,
      totalMs: 175,
      maxMs: 100,
      avgMs: 58.33,
    });
  });

  it('should ignore invalid latencies', () => {
    service.recordLatency('classify', -1);
    service.recordLatency('classify', Number.NaN);

    expect(service.snapshot().latencies).toEqual({});
  });
});

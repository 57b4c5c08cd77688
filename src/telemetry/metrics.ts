import http from 'http';
import { Counter, Gauge, register } from 'prom-client';
import { logger } from '../utils/logger';

let metricsServer: http.Server | null = null;

export const positionGauge = new Gauge({
  name: 'grid_position_contracts',
  help: 'Open position size per hedge side',
  labelNames: ['symbol', 'side'] as const,
});

export const pendingOrdersGauge = new Gauge({
  name: 'grid_pending_order_quantity',
  help: 'Resting order quantity per counter role',
  labelNames: ['symbol', 'role'] as const,
});

export const spacingGauge = new Gauge({
  name: 'grid_spacing_ratio',
  help: 'Current grid spacing per side and purpose',
  labelNames: ['symbol', 'side', 'kind'] as const,
});

export const protectionActiveGauge = new Gauge({
  name: 'protection_active',
  help: 'Hibernation flag (1 while hibernating)',
  labelNames: ['symbol'] as const,
});

export const runMoveGauge = new Gauge({
  name: 'protection_run_move_pct',
  help: 'Cumulative percent move of the current directional run',
  labelNames: ['symbol'] as const,
});

export const volatilityGauge = new Gauge({
  name: 'protection_volatility',
  help: 'Current and baseline price-delta volatility',
  labelNames: ['symbol', 'kind'] as const,
});

export const ordersPlacedCounter = new Counter({
  name: 'grid_orders_placed_total',
  help: 'Orders placed by purpose',
  labelNames: ['symbol', 'side', 'purpose'] as const,
});

export const orderCancelCounter = new Counter({
  name: 'grid_orders_cancelled_total',
  help: 'Order cancellations by side',
  labelNames: ['symbol', 'side'] as const,
});

export const fillCounter = new Counter({
  name: 'grid_fills_total',
  help: 'Confirmed fills by position side',
  labelNames: ['symbol', 'side'] as const,
});

export const gatewayErrorCounter = new Counter({
  name: 'gateway_errors_total',
  help: 'Gateway call failures by operation',
  labelNames: ['symbol', 'operation'] as const,
});

export const rejectedPriceCounter = new Counter({
  name: 'price_updates_rejected_total',
  help: 'Price updates refused by validation',
  labelNames: ['symbol', 'reason'] as const,
});

export const protectionTriggerCounter = new Counter({
  name: 'protection_triggers_total',
  help: 'Emergency sequence attempts by outcome',
  labelNames: ['symbol', 'outcome'] as const,
});

export const flattenOrderCounter = new Counter({
  name: 'protection_flatten_orders_total',
  help: 'Emergency close orders by fill result',
  labelNames: ['symbol', 'side', 'result'] as const,
});

export function startMetricsServer(port: number) {
  if (metricsServer) return metricsServer;
  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.writeHead(404);
      res.end('Not found');
      return;
    }
    register
      .metrics()
      .then((metrics) => {
        res.writeHead(200, { 'Content-Type': register.contentType });
        res.end(metrics);
      })
      .catch((err: unknown) => {
        res.writeHead(500);
        res.end(String(err));
      });
  });
  server.listen(port, () => {
    logger.info('metrics_server_listening', { event: 'metrics_server_listening', port });
  });
  metricsServer = server;
  return server;
}

export async function stopMetricsServer() {
  const server = metricsServer;
  if (!server) return;
  metricsServer = null;
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export function resetMetrics() {
  positionGauge.reset();
  pendingOrdersGauge.reset();
  spacingGauge.reset();
  protectionActiveGauge.reset();
  runMoveGauge.reset();
  volatilityGauge.reset();
  ordersPlacedCounter.reset();
  orderCancelCounter.reset();
  fillCounter.reset();
  gatewayErrorCounter.reset();
  rejectedPriceCounter.reset();
  protectionTriggerCounter.reset();
  flattenOrderCounter.reset();
}

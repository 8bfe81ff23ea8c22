// Lightweight metrics collection system
interface Metrics {
  requests: number;
  errors: number;
  sales: number;
  rejectedSales: number;
  productUploads: number;
  inventoryUploads: number;
  inventoryReads: number;
  productStockReads: number;
}

const emptyMetrics = (): Metrics => ({
  requests: 0,
  errors: 0,
  sales: 0,
  rejectedSales: 0,
  productUploads: 0,
  inventoryUploads: 0,
  inventoryReads: 0,
  productStockReads: 0,
});

class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  increment(metric: keyof Metrics, count: number = 1): void {
    this.metrics[metric] += count;
  }

  getMetrics(): Metrics {
    return { ...this.metrics };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.metrics = emptyMetrics();
  }
}

// Global metrics instance
export const metrics = new MetricsCollector();

// Helper functions for common metric increments
export const incrementRequests = () => metrics.increment('requests');
export const incrementErrors = () => metrics.increment('errors');
export const incrementSales = () => metrics.increment('sales');
export const incrementRejectedSales = () => metrics.increment('rejectedSales');
export const incrementProductUploads = () => metrics.increment('productUploads');
export const incrementInventoryUploads = () => metrics.increment('inventoryUploads');
export const incrementInventoryReads = () => metrics.increment('inventoryReads');
export const incrementProductStockReads = () => metrics.increment('productStockReads');

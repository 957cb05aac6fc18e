export interface Gauge {
  name: string;
  help: string;
  value: number;
}

/** Render gauges in the Prometheus text exposition format. */
export function renderGauges(gauges: Gauge[]): string {
  return gauges
    .map((gauge) => {
      const value = Number.isFinite(gauge.value) ? gauge.value : 0;
      return `# HELP ${gauge.name} ${gauge.help}\n# TYPE ${gauge.name} gauge\n${gauge.name} ${value}\n`;
    })
    .join('');
}

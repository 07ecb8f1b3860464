import type { ExtractionStatus, StageName } from '@schemalens/core';

export type ToolOutcome = 'success' | 'error';
export type StageOutcome = 'succeeded' | 'failed';

type MetricKey = string;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function labelsToKey(labels: Record<string, string>): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

/**
 * In-process counters rendered in the Prometheus text format
 */
export class Metrics {
  private readonly startedAt = Date.now();
  private readonly counters = new Map<MetricKey, number>();
  private readonly gauges = new Map<MetricKey, number>();

  private readonly durationMsSumByStage = new Map<string, number>();
  private readonly durationMsCountByStage = new Map<string, number>();

  private inc(key: MetricKey): void {
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  incRunStarted(): void {
    this.inc('schemalens_runs_started_total');
  }

  incRunFinished(status: Exclude<ExtractionStatus, 'running'>): void {
    this.inc(`schemalens_runs_finished_total${labelsToKey({ status })}`);
  }

  setRunsActive(value: number): void {
    this.gauges.set('schemalens_runs_active', value);
  }

  observeStage(stage: StageName, outcome: StageOutcome, durationMs: number): void {
    this.inc(`schemalens_stage_runs_total${labelsToKey({ stage, outcome })}`);
    this.durationMsSumByStage.set(stage, (this.durationMsSumByStage.get(stage) ?? 0) + durationMs);
    this.durationMsCountByStage.set(stage, (this.durationMsCountByStage.get(stage) ?? 0) + 1);
  }

  incTool(tool: string, outcome: ToolOutcome): void {
    this.inc(`schemalens_tool_requests_total${labelsToKey({ tool, outcome })}`);
  }

  incHttp(route: string, status: number): void {
    this.inc(`schemalens_http_requests_total${labelsToKey({ route, status: String(status) })}`);
  }

  private pushFamily(lines: string[], name: string, type: 'counter' | 'gauge', help: string): void {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} ${type}`);
    const source = type === 'counter' ? this.counters : this.gauges;
    const entries = Array.from(source.entries())
      .filter(([key]) => key === name || key.startsWith(`${name}{`))
      .sort(([a], [b]) => a.localeCompare(b));
    for (const [key, value] of entries) {
      lines.push(`${key} ${value}`);
    }
  }

  render(): string {
    const lines: string[] = [];

    lines.push('# HELP schemalens_uptime_seconds Process uptime in seconds');
    lines.push('# TYPE schemalens_uptime_seconds gauge');
    lines.push(`schemalens_uptime_seconds ${(Date.now() - this.startedAt) / 1000}`);

    this.pushFamily(lines, 'schemalens_runs_started_total', 'counter', 'Extraction runs started');
    this.pushFamily(lines, 'schemalens_runs_finished_total', 'counter', 'Extraction runs finished by status');
    this.pushFamily(lines, 'schemalens_runs_active', 'gauge', 'Extraction runs currently executing');
    this.pushFamily(lines, 'schemalens_stage_runs_total', 'counter', 'Stage invocations by outcome');

    lines.push('# HELP schemalens_stage_duration_ms Stage duration in milliseconds');
    lines.push('# TYPE schemalens_stage_duration_ms summary');
    for (const stage of Array.from(this.durationMsSumByStage.keys()).sort()) {
      const sum = this.durationMsSumByStage.get(stage) ?? 0;
      const count = this.durationMsCountByStage.get(stage) ?? 0;
      lines.push(`schemalens_stage_duration_ms_sum${labelsToKey({ stage })} ${sum}`);
      lines.push(`schemalens_stage_duration_ms_count${labelsToKey({ stage })} ${count}`);
    }

    this.pushFamily(lines, 'schemalens_tool_requests_total', 'counter', 'Total MCP tool requests');
    this.pushFamily(lines, 'schemalens_http_requests_total', 'counter', 'HTTP API requests by route and status');

    return `${lines.join('\n')}\n`;
  }
}

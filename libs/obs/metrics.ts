import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";
import { errorMessage } from "../errors";

const cw = new CloudWatchClient({});
const NAMESPACE = process.env.METRICS_NS ?? "pgx.risk";

export type MetricName =
    | "analyze_success_count"
    | "analyze_error_count"
    | "analyze_invalid_count"
    | "analyze_duration_ms"
    | "vcf_unreadable_count"
    | "variants_detected_count"
    | "advisory_used_count"
    | "bottleneck_count"
    | "upload_url_issued_count";

export type Dimensions = Record<string, string>;

function dims(d: Dimensions | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

async function put(name: MetricName, value: number, unit: StandardUnit, d?: Dimensions) {
    try {
        await cw.send(new PutMetricDataCommand({
            Namespace: NAMESPACE,
            MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
        }));
    } catch (e) { console.warn("metric-failed", name, errorMessage(e)); }
}

export async function metricCount(name: MetricName, value = 1, d?: Dimensions) {
    await put(name, value, "Count", d);
}

export async function metricMs(name: MetricName, ms: number, d?: Dimensions) {
    await put(name, ms, "Milliseconds", d);
}

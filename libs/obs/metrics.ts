import { CloudWatchClient, PutMetricDataCommand, type MetricDatum } from "@aws-sdk/client-cloudwatch";

import { errorMessage } from "../archive/errors";

const cw = new CloudWatchClient({});
const NAMESPACE = process.env.METRICS_NS ?? "audit.archive";

function dims(d: Record<string, string> | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

async function put(names: string, MetricData: MetricDatum[]) {
    try {
        await cw.send(new PutMetricDataCommand({ Namespace: NAMESPACE, MetricData }));
    } catch (e) { console.warn("metric-failed", names, errorMessage(e)); }
}

export async function metricCount(name: string, value = 1, d?: Record<string, string>) {
    await put(name, [{ MetricName: name, Value: value, Unit: "Count", Dimensions: dims(d) }]);
}

export async function metricMs(name: string, ms: number, d?: Record<string, string>) {
    await put(name, [{ MetricName: name, Value: ms, Unit: "Milliseconds", Dimensions: dims(d) }]);
}

/** Several counters in one PutMetricData call. */
export async function metricCounts(values: Record<string, number>, d?: Record<string, string>) {
    const MetricData = Object.entries(values).map(([MetricName, Value]) => ({
        MetricName, Value, Unit: "Count" as const, Dimensions: dims(d),
    }));
    if (MetricData.length === 0) return;
    await put(Object.keys(values).join(","), MetricData);
}

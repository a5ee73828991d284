/**
 * OpenTelemetry span helper.
 * Spans are no-ops unless the host application registers an SDK.
 */
import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";

/**
 * Execute a function within a new span.
 * Automatically handles errors and span lifecycle.
 */
export async function withSpan<T>(
	tracerName: string,
	spanName: string,
	fn: (span: Span) => Promise<T>,
	attributes?: Record<string, string | number | boolean>
): Promise<T> {
	const tracer = trace.getTracer(tracerName);

	return tracer.startActiveSpan(spanName, async (span) => {
		try {
			if (attributes) {
				span.setAttributes(attributes);
			}
			const result = await fn(span);
			span.setStatus({ code: SpanStatusCode.OK });
			return result;
		} catch (error) {
			span.setStatus({
				code: SpanStatusCode.ERROR,
				message: error instanceof Error ? error.message : "Unknown error",
			});
			if (error instanceof Error) {
				span.recordException(error);
			}
			throw error;
		} finally {
			span.end();
		}
	});
}

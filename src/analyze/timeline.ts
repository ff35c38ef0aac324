/**
 * Sort a timeline ascending by timestamp. Array.prototype.sort is stable, so
 * events with equal timestamps keep the order they were appended in.
 */
export function sortTimeline<T extends { timestamp: Date }>(events: T[]): T[] {
	return [...events].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

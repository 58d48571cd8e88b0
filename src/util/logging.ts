let filter = (_: string) => true;

/**
 * Log to stderr under a topic; the filter decides which topics are shown.
 */
export default function log(topic: string, ...args: unknown[]): void {
    if (filter(topic)) {
        console.error(new Date(), topic, ...args);
    }
}

export function setFilter(newFilter: (_: string) => boolean): void {
    filter = newFilter;
}

/** Filter that lets through only the listed topics */
export function topics(names: string[]): (_: string) => boolean {
    const allowed = new Set(names);
    return (topic) => allowed.has(topic);
}

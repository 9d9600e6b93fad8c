/**
 * Insertion-ordered frequency tally. Among equal counts, the key seen first
 * wins, which makes "most common" deterministic.
 */
export class Tally<T> {
    private readonly entries = new Map<string, { value: T; count: number }>();

    add(key: string, value: T): void {
        const entry = this.entries.get(key);
        if (entry) {
            entry.count += 1;
        } else {
            this.entries.set(key, { value, count: 1 });
        }
    }

    /**
     * The most frequent value, or null when nothing was added.
     */
    mostFrequent(): T | null {
        let best: { value: T; count: number } | null = null;
        for (const entry of this.entries.values()) {
            if (!best || entry.count > best.count) {
                best = entry;
            }
        }
        return best ? best.value : null;
    }
}

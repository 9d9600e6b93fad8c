/**
 * Ordered fallback chains (content tokens → filename tokens,
 * content date → creation → modification).
 */

export interface FallbackProvider<T, N extends string = string> {
    name: N;
    get: () => T | null | Promise<T | null>;
}

export interface FallbackResult<T, N extends string = string> {
    source: N;
    value: T;
}

/**
 * Evaluate providers in order and return the first usable value along with
 * the name of the provider that produced it. Later providers are never called
 * once one succeeds.
 *
 * @param isUsable - Rejects present-but-empty values (e.g. an empty token set)
 */
export async function firstAvailable<T, N extends string>(
    providers: readonly FallbackProvider<T, N>[],
    isUsable: (value: T) => boolean = () => true
): Promise<FallbackResult<T, N> | null> {
    for (const provider of providers) {
        const value = await provider.get();
        if (value !== null && isUsable(value)) {
            return { source: provider.name, value };
        }
    }
    return null;
}

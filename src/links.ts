/**
 * Navigable links from a result to its test method
 */

/**
 * Build `<base>/symbol/<method>/?context=<class>&jump=true&lang=ts`.
 * The path of `baseUri` is replaced; scheme, host and port are kept.
 *
 * @example
 * ```typescript
 * buildSymbolLink('https://code.example.test', 'testParse', 'ParserTest');
 * // 'https://code.example.test/symbol/testParse/?context=ParserTest&jump=true&lang=ts'
 * ```
 */
export function buildSymbolLink(baseUri: string, method: string, context: string): string {
    const url = new URL(baseUri);
    url.pathname = `/symbol/${encodeURIComponent(method)}/`;
    url.search = '';
    url.hash = '';
    url.searchParams.set('context', context);
    url.searchParams.set('jump', 'true');
    url.searchParams.set('lang', 'ts');
    return url.toString();
}

/**
 * Print data as pretty JSON on stdout. Diagnostics never go through here.
 */
export function output(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
}

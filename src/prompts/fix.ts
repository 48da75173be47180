/**
 * Fix prompt: the aggregated bug report followed by the code it refers to.
 */

export function getFixPrompt(code: string, bugReport: string): string {
    return `Fix the following bugs in the code:

Bug report:
${bugReport}

Code:
${code}`;
}

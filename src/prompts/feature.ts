export function getFeaturePrompt(code: string, feature: string): string {
    return `Add feature: ${feature}\n\nExisting code:\n${code}`;
}

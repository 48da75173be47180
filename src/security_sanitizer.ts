/**
 * Security Sanitizer - strips dangerous constructs from prompts and code
 * before they leave the process or are stored.
 *
 * Text/regex based, not a parser: a denylisted token in an unrelated context
 * is stripped as well.
 */

export const DISALLOWED_IMPORTS = ['os', 'subprocess', 'sys', 'shutil'] as const;
export const DISALLOWED_FUNCTIONS = ['eval', 'exec', 'system', 'popen'] as const;
export const SHELL_INVOCATIONS = [
    'os.system',
    'os.popen',
    'subprocess.call',
    'subprocess.run',
    'subprocess.Popen',
    'subprocess.check_output',
] as const;

export type FindingKind = 'import' | 'call' | 'shell';

export interface SecurityFinding {
    kind: FindingKind;
    token: string;
    message: string;
}

const PROMPT_INJECTION_CHARS = /[`$\\]/g;
const SCRIPT_BLOCKS = /<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const HTML_TAGS = /<\/?[a-z][^>]*>/gi;

const IMPORT_LINE = /^[ \t]*import[ \t]+(.+)$/i;
const FROM_IMPORT_LINE = /^[ \t]*from[ \t]+([\w.]+)[ \t]+import\b/i;

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function callPattern(names: readonly string[], flags: string): RegExp {
    return new RegExp(`\\b(${names.map(escapeRegExp).join('|')})\\s*\\(`, flags);
}

const SHELL_CALL = callPattern(SHELL_INVOCATIONS, 'gi');
const DENYLISTED_CALL = callPattern(DISALLOWED_FUNCTIONS, 'gi');

/** Root module names (lowercased) imported by a single line, if it is an import statement. */
function importedModules(line: string): string[] {
    const from = FROM_IMPORT_LINE.exec(line);
    if (from) {
        return [from[1].split('.')[0].toLowerCase()];
    }
    const imp = IMPORT_LINE.exec(line);
    if (!imp) return [];
    return imp[1]
        .split(',')
        .map((part) => part.trim().split(/\s+/)[0] ?? '')
        .filter((name) => /^[\w.]+$/.test(name))
        .map((name) => name.split('.')[0].toLowerCase());
}

function isDisallowedImport(line: string): boolean {
    const disallowed: readonly string[] = DISALLOWED_IMPORTS;
    return importedModules(line).some((m) => disallowed.includes(m));
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/** Pure and total: never throws, whatever the input. Script/style bodies go with their tags. */
export function sanitizePrompt(text: string): string {
    return String(text ?? '')
        .replace(SCRIPT_BLOCKS, '')
        .replace(HTML_TAGS, '')
        .replace(PROMPT_INJECTION_CHARS, '')
        .trim();
}

export function sanitizeCode(code: string): string {
    const kept = code.split('\n').filter((line) => !isDisallowedImport(line));
    return kept
        .join('\n')
        .replace(SHELL_CALL, '')
        .replace(DENYLISTED_CALL, '');
}

/** Non-mutating report, one finding per denylist entry present in the code. */
export function checkCodeSecurity(code: string): SecurityFinding[] {
    const findings: SecurityFinding[] = [];
    const lines = code.split('\n');

    const imported = new Set<string>();
    for (const line of lines) {
        for (const m of importedModules(line)) imported.add(m);
    }
    for (const mod of DISALLOWED_IMPORTS) {
        if (imported.has(mod)) {
            findings.push({ kind: 'import', token: mod, message: `Use of disallowed import '${mod}'` });
        }
    }

    for (const fn of DISALLOWED_FUNCTIONS) {
        if (callPattern([fn], 'i').test(code)) {
            findings.push({ kind: 'call', token: fn, message: `Use of dangerous function '${fn}'` });
        }
    }

    for (const shell of SHELL_INVOCATIONS) {
        if (callPattern([shell], 'i').test(code)) {
            findings.push({ kind: 'shell', token: shell, message: `Potential shell injection via '${shell}'` });
        }
    }

    return findings;
}

import * as lodash from 'lodash';
import * as types from './types';

/**
 * Package markers of classes that never count towards coverage: generated sources, DTOs, models and exceptions.
 * Matched case-insensitively against whole package segments of the fully qualified class name.
 */
export const BUILT_IN_EXCLUSION_PATTERNS: readonly RegExp[] = [
    /(^|\.)generated(\.|$)/i,
    /(^|\.)dtos?(\.|$)/i,
    /(^|\.)models?(\.|$)/i,
    /(^|\.)exceptions?(\.|$)/i
];

export type ScopeOptions = {
    targetModules?: string;
    targetPackages?: string;
    targetClasses?: string;
}

/**
 * Splits a comma-separated input like "UserService, AuthController" into trimmed, non-empty entries.
 */
export function parseScopeList(value: string | undefined): string[] {
    if (!value) {
        return [];
    }
    return lodash.uniq(value.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0));
}

export function createScopeQuery(options: ScopeOptions = {}): types.ScopeQuery {
    return Object.freeze({
        targetModules: new Set(parseScopeList(options.targetModules)),
        targetPackages: new Set(parseScopeList(options.targetPackages)),
        targetClasses: new Set(parseScopeList(options.targetClasses)),
        exclusionPatterns: BUILT_IN_EXCLUSION_PATTERNS
    });
}

export function isExcludedByPattern(className: string, query: types.ScopeQuery): boolean {
    return query.exclusionPatterns.some((pattern) => pattern.test(className));
}

/**
 * Decides whether a class belongs to the requested scope. Built-in exclusions win over every target,
 * packages match by prefix and classes match by full name or by simple-name suffix.
 * Target modules are not consulted here, they only steer report discovery.
 */
export function isClassInScope(className: string, query: types.ScopeQuery): boolean {
    if (isExcludedByPattern(className, query)) {
        return false;
    }
    if (query.targetPackages.size == 0 && query.targetClasses.size == 0) {
        return true;
    }

    for (const targetPackage of query.targetPackages) {
        if (className.startsWith(targetPackage)) {
            return true;
        }
    }
    for (const targetClass of query.targetClasses) {
        if (className === targetClass || className.endsWith('.' + targetClass)) {
            return true;
        }
    }
    return false;
}

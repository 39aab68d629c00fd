/**
 * A named preset of prompt fragments.
 */
export interface StyleTemplate {
    /** Lookup key, e.g. "cinematic" */
    readonly name: string;
    /** Human-readable label for the style picker */
    readonly label: string;
    /** Ordered prompt fragments appended to every shot description */
    readonly fragments: readonly string[];
}

/**
 * Creates a frozen StyleTemplate.
 */
export function createStyleTemplate(name: string, label: string, fragments: string[]): StyleTemplate {
    if (!name.trim()) {
        throw new Error('StyleTemplate name cannot be empty');
    }
    if (fragments.length === 0) {
        throw new Error(`StyleTemplate "${name}" needs at least one prompt fragment`);
    }
    return Object.freeze({
        name,
        label: label.trim() || name,
        fragments: Object.freeze([...fragments]),
    });
}

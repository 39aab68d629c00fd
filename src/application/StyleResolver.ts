import fs from 'fs';
import { StyleTemplate, createStyleTemplate } from '../domain/entities/StyleTemplate';
import { UnknownStyleError } from '../domain/errors';

/**
 * Immutable style name -> template lookup, loaded once at startup.
 * Lookups fail closed: there is no default style.
 */
export class StyleResolver {
    private readonly templates: ReadonlyMap<string, StyleTemplate>;

    constructor(templates: StyleTemplate[]) {
        const map = new Map<string, StyleTemplate>();
        for (const template of templates) {
            if (map.has(template.name)) {
                throw new Error(`Duplicate style template: ${template.name}`);
            }
            map.set(template.name, template);
        }
        this.templates = map;
    }

    /**
     * Loads templates from a JSON file shaped as
     * `{ "<name>": { "label"?: string, "fragments": string[] } }`.
     */
    static fromFile(filePath: string): StyleResolver {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to read style templates from ${filePath}: ${message}`);
        }

        const resolver = new StyleResolver(parseStyleTemplates(raw));
        console.log(`[StyleResolver] Loaded ${resolver.list().length} styles from ${filePath}`);
        return resolver;
    }

    resolve(styleName: string): StyleTemplate {
        const template = this.templates.get(styleName);
        if (!template) {
            throw new UnknownStyleError(styleName);
        }
        return template;
    }

    has(styleName: string): boolean {
        return this.templates.has(styleName);
    }

    list(): StyleTemplate[] {
        return Array.from(this.templates.values());
    }
}

/**
 * Validates the raw template mapping.
 */
export function parseStyleTemplates(raw: unknown): StyleTemplate[] {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error('Style templates must be a JSON object keyed by style name');
    }

    return Object.entries(raw).map(([name, entry]: [string, unknown]) => {
        if (typeof entry !== 'object' || entry === null || !('fragments' in entry)) {
            throw new Error(`Style "${name}" must be an object with a fragments array`);
        }
        const { fragments } = entry;
        if (!Array.isArray(fragments) || fragments.length === 0) {
            throw new Error(`Style "${name}" needs a non-empty fragments array`);
        }
        const texts = fragments.filter((fragment): fragment is string => typeof fragment === 'string' && fragment.trim().length > 0);
        if (texts.length !== fragments.length) {
            throw new Error(`Style "${name}" fragments must be non-empty strings`);
        }
        const label = 'label' in entry && typeof entry.label === 'string' ? entry.label : name;
        return createStyleTemplate(name, label, texts.map((text) => text.trim()));
    });
}

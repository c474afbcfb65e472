import { TemplateError } from '../errors';
import { ReviewValues, YoutubeLink } from '../entities/ReviewFields';

/**
 * TemplateEngine
 *
 * Turns the post template into a node tree once, at startup, and renders it
 * against collected review values.
 *
 * Syntax: `{{name}}` for a value, `{{#name}} ... {{/name}}` for a section.
 * Only the names registered below are accepted; anything else fails the
 * parse, as does any other `{{...}}` or a stray `{{` / `}}`. Values are
 * substituted as given and text outside placeholders is copied unchanged.
 */

export type ScalarPlaceholder = 'title' | 'labels' | 'poster' | 'rating' | 'review' | 'source';
export type ScenePlaceholder = 'sceneNumber' | 'sceneImage' | 'sceneIndex';
export type YoutubePlaceholder = 'youtubeEmbed' | 'youtubeId';
export type PlaceholderName = ScalarPlaceholder | ScenePlaceholder | YoutubePlaceholder;
export type SectionName = 'gallery' | 'scene' | 'youtube';

export type TemplateNode =
    | { type: 'text'; text: string }
    | { type: 'placeholder'; name: PlaceholderName }
    | { type: 'section'; name: SectionName; children: TemplateNode[] };

interface SceneContext {
    number: number;
    index: number;
}

interface RenderContext {
    values: Partial<ReviewValues>;
    scene: SceneContext | null;
    youtube: YoutubeLink | null;
}

interface PlaceholderRenderer {
    /** Section the placeholder must sit inside, null for anywhere */
    scope: SectionName | null;
    description: string;
    render(ctx: RenderContext): string | undefined;
}

interface SectionRenderer {
    /** Enclosing section, null for top level only */
    parent: SectionName | null;
    description: string;
    /** One context per emitted copy of the section body */
    expand(ctx: RenderContext): RenderContext[] | undefined;
}

const PLACEHOLDERS: Record<PlaceholderName, PlaceholderRenderer> = {
    title: {
        scope: null,
        description: 'Movie title',
        render: ({ values }) => values.title,
    },
    labels: {
        scope: null,
        description: 'Labels joined with ", "',
        render: ({ values }) => values.labels?.join(', '),
    },
    poster: {
        scope: null,
        description: 'Poster image name',
        render: ({ values }) => values.poster,
    },
    rating: {
        scope: null,
        description: 'Movie rating',
        render: ({ values }) => values.rating,
    },
    review: {
        scope: null,
        description: 'Review text',
        render: ({ values }) => values.review,
    },
    source: {
        scope: null,
        description: 'Source data (Year/Month/MovieCode)',
        render: ({ values }) => values.source,
    },
    sceneNumber: {
        scope: 'scene',
        description: 'Scene number',
        render: ({ scene }) => scene?.number.toString(),
    },
    sceneImage: {
        scope: 'scene',
        description: 'Scene image name, <poster>-<scene>',
        render: ({ values, scene }) => {
            if (!scene || values.poster === undefined) {
                return undefined;
            }
            return sceneImageName(values.poster, scene.number);
        },
    },
    sceneIndex: {
        scope: 'scene',
        description: 'Position of the scene in the gallery, from 1',
        render: ({ scene }) => scene?.index.toString(),
    },
    youtubeEmbed: {
        scope: 'youtube',
        description: 'YouTube embed URL',
        render: ({ youtube }) => youtube?.embedUrl,
    },
    youtubeId: {
        scope: 'youtube',
        description: 'YouTube video id',
        render: ({ youtube }) => youtube?.videoId,
    },
};

const SECTIONS: Record<SectionName, SectionRenderer> = {
    gallery: {
        parent: null,
        description: 'Scene gallery, omitted when there are no scenes',
        expand: (ctx) => {
            if (!ctx.values.scenes) {
                return undefined;
            }
            return ctx.values.scenes.length > 0 ? [ctx] : [];
        },
    },
    scene: {
        parent: 'gallery',
        description: 'Repeated once per scene',
        expand: (ctx) => ctx.values.scenes?.map((number, i) => ({ ...ctx, scene: { number, index: i + 1 } })),
    },
    youtube: {
        parent: null,
        description: 'YouTube embed, omitted when the video was skipped',
        expand: (ctx) => {
            if (ctx.values.youtube === undefined) {
                return undefined;
            }
            return ctx.values.youtube ? [{ ...ctx, youtube: ctx.values.youtube }] : [];
        },
    },
};

/**
 * Names every template must contain.
 */
export const REQUIRED_PLACEHOLDERS: readonly (ScalarPlaceholder | SectionName)[] = [
    'title',
    'labels',
    'poster',
    'rating',
    'review',
    'gallery',
    'scene',
    'youtube',
    'source',
];

const TOKEN_PATTERN = /\{\{([^{}]*)\}\}/g;
const TAG_PATTERN = /^\s*([#/]?)\s*([A-Za-z][A-Za-z0-9_]*)\s*$/;

/**
 * Image name convention for a scene: the poster name, a dash, the scene number.
 */
export function sceneImageName(poster: string, scene: number): string {
    return `${poster}-${scene}`;
}

function isPlaceholderName(name: string): name is PlaceholderName {
    return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, name);
}

function isSectionName(name: string): name is SectionName {
    return Object.prototype.hasOwnProperty.call(SECTIONS, name);
}

interface OpenSection {
    name: SectionName;
    children: TemplateNode[];
}

/**
 * A parsed, validated post template.
 */
export class PostTemplate {
    private constructor(
        public readonly source: string,
        public readonly nodes: readonly TemplateNode[]
    ) { }

    static parse(source: string): PostTemplate {
        const root: TemplateNode[] = [];
        const stack: OpenSection[] = [];
        const seen = new Set<string>();
        const current = () => (stack.length > 0 ? stack[stack.length - 1].children : root);

        const pushText = (text: string) => {
            if (text.includes('{{') || text.includes('}}')) {
                throw new TemplateError('UnknownPlaceholder', `Unbalanced braces in "${text.trim().slice(0, 40)}"`);
            }
            current().push({ type: 'text', text });
        };

        let cursor = 0;
        for (const match of source.matchAll(TOKEN_PATTERN)) {
            const [token, inner] = match;
            const start = match.index ?? 0;
            if (start > cursor) {
                pushText(source.slice(cursor, start));
            }
            cursor = start + token.length;

            const tag = TAG_PATTERN.exec(inner);
            if (!tag) {
                throw new TemplateError('UnknownPlaceholder', `Unknown placeholder ${token}`);
            }
            const [, marker, name] = tag;

            if (marker === '#') {
                if (!isSectionName(name)) {
                    throw new TemplateError('UnknownPlaceholder', `Unknown section "${name}" in ${token}`);
                }
                const parent = stack.length > 0 ? stack[stack.length - 1].name : null;
                const expected = SECTIONS[name].parent;
                if (parent !== expected) {
                    const where = expected ? `inside {{#${expected}}}` : 'at the top level';
                    throw new TemplateError('MalformedTemplate', `Section "${name}" must be placed ${where}`);
                }
                const children: TemplateNode[] = [];
                current().push({ type: 'section', name, children });
                stack.push({ name, children });
                seen.add(name);
                continue;
            }

            if (marker === '/') {
                const open = stack.pop();
                if (!open || open.name !== name) {
                    const expected = open ? `{{/${open.name}}}` : 'no closing tag';
                    throw new TemplateError('MalformedTemplate', `Unexpected ${token}, expected ${expected}`);
                }
                continue;
            }

            if (!isPlaceholderName(name)) {
                throw new TemplateError('UnknownPlaceholder', `Unknown placeholder ${token}`);
            }
            const scope = PLACEHOLDERS[name].scope;
            if (scope && !stack.some((open) => open.name === scope)) {
                throw new TemplateError('UnknownPlaceholder', `${token} is only valid inside {{#${scope}}}`);
            }
            current().push({ type: 'placeholder', name });
            seen.add(name);
        }

        if (stack.length > 0) {
            throw new TemplateError('MalformedTemplate', `Section "${stack[stack.length - 1].name}" is never closed`);
        }
        if (cursor < source.length) {
            pushText(source.slice(cursor));
        }

        const missing = REQUIRED_PLACEHOLDERS.filter((name) => !seen.has(name));
        if (missing.length > 0) {
            throw new TemplateError(
                'MissingPlaceholder',
                `Template is missing placeholders: ${missing.map((name) => `{{${name}}}`).join(', ')}`
            );
        }

        return new PostTemplate(source, root);
    }

    render(values: Partial<ReviewValues>): string {
        return renderNodes(this.nodes, { values, scene: null, youtube: null });
    }
}

function renderNodes(nodes: readonly TemplateNode[], ctx: RenderContext): string {
    let html = '';
    for (const node of nodes) {
        switch (node.type) {
            case 'text':
                html += node.text;
                break;
            case 'placeholder': {
                const value = PLACEHOLDERS[node.name].render(ctx);
                if (value === undefined) {
                    throw new TemplateError('MissingValue', `No value for {{${node.name}}}`);
                }
                html += value;
                break;
            }
            case 'section': {
                const copies = SECTIONS[node.name].expand(ctx);
                if (copies === undefined) {
                    throw new TemplateError('MissingValue', `No value for {{#${node.name}}}`);
                }
                for (const copy of copies) {
                    html += renderNodes(node.children, copy);
                }
                break;
            }
        }
    }
    return html;
}

export function parseTemplate(source: string): PostTemplate {
    return PostTemplate.parse(source);
}

/**
 * Renders a parsed template, or parses and renders a template string.
 */
export function renderTemplate(template: PostTemplate | string, values: Partial<ReviewValues>): string {
    const parsed = typeof template === 'string' ? PostTemplate.parse(template) : template;
    return parsed.render(values);
}

/**
 * Token list with descriptions, for showing the template structure in chat.
 */
export function describePlaceholders(): { token: string; description: string }[] {
    const placeholders = Object.entries(PLACEHOLDERS).map(([name, placeholder]) => ({
        token: `{{${name}}}`,
        description: placeholder.description,
    }));
    const sections = Object.entries(SECTIONS).map(([name, section]) => ({
        token: `{{#${name}}}...{{/${name}}}`,
        description: section.description,
    }));
    return [...placeholders, ...sections];
}

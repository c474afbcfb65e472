/**
 * ReviewFields
 *
 * The fixed, ordered list of fields collected for a movie review post,
 * with the validator and prompt for each one.
 */

import { ValidationError } from '../errors';

export type FieldName =
    | 'title'
    | 'labels'
    | 'poster'
    | 'rating'
    | 'review'
    | 'scenes'
    | 'youtube'
    | 'source';

/**
 * A YouTube link reduced to the parts the template needs.
 */
export interface YoutubeLink {
    /** What the user typed */
    url: string;
    videoId: string;
    embedUrl: string;
}

/**
 * Field values after validation.
 */
export interface ReviewValues {
    title: string;
    labels: string[];
    poster: string;
    /** Kept as the trimmed text so "8.0" stays "8.0" */
    rating: string;
    review: string;
    scenes: number[];
    /** null when the user skipped the video */
    youtube: YoutubeLink | null;
    /** Year/Month/Code */
    source: string;
}

export interface InvalidInput {
    ok: false;
    error: ValidationError;
}

export type ValidationResult<T> = { ok: true; value: T } | InvalidInput;

export interface FieldSpec<K extends FieldName = FieldName> {
    name: K;
    /** Human-readable name shown in summaries and buttons */
    label: string;
    prompt: string;
    multiplicity: 'single' | 'list';
    validate(raw: string): ValidationResult<ReviewValues[K]>;
}

export const RATING_MIN = 0;
export const RATING_MAX = 10;

const SKIP_WORDS = new Set(['skip', 'none', '-']);
const VIDEO_ID = '([A-Za-z0-9_-]+)';
const YOUTUBE_PATTERNS: RegExp[] = [
    new RegExp(`^(?:https?://)?(?:www\\.|m\\.)?youtube\\.com/watch\\?(?:[^#]*&)?v=${VIDEO_ID}`, 'i'),
    new RegExp(`^(?:https?://)?youtu\\.be/${VIDEO_ID}`, 'i'),
    new RegExp(`^(?:https?://)?(?:www\\.|m\\.)?youtube\\.com/(?:embed|shorts)/${VIDEO_ID}`, 'i'),
];
const SOURCE_PATTERN = /^(\d{4})\/(\d{1,2})\/([A-Za-z0-9_-]+)$/;

function ok<T>(value: T): ValidationResult<T> {
    return { ok: true, value };
}

function fail(field: FieldName, message: string): InvalidInput {
    return { ok: false, error: new ValidationError(field, message) };
}

function isSkip(raw: string): boolean {
    return SKIP_WORDS.has(raw.trim().toLowerCase());
}

function requireText(field: FieldName, label: string) {
    return (raw: string): ValidationResult<string> => {
        const value = raw.trim();
        if (!value) {
            return fail(field, `${label} cannot be empty.`);
        }
        return ok(value);
    };
}

function validateLabels(raw: string): ValidationResult<string[]> {
    const seen = new Set<string>();
    const labels: string[] = [];
    for (const part of raw.split(',')) {
        const label = part.trim();
        if (!label || seen.has(label.toLowerCase())) {
            continue;
        }
        seen.add(label.toLowerCase());
        labels.push(label);
    }
    if (labels.length === 0) {
        return fail('labels', 'Please give at least one label (comma-separated).');
    }
    return ok(labels);
}

function validateRating(raw: string): ValidationResult<string> {
    const text = raw.trim();
    if (!/^\d+(\.\d+)?$/.test(text)) {
        return fail('rating', 'Please enter a valid number for the rating (e.g. 8.5).');
    }
    const rating = parseFloat(text);
    if (rating < RATING_MIN || rating > RATING_MAX) {
        return fail('rating', `Rating should be between ${RATING_MIN} and ${RATING_MAX}.`);
    }
    return ok(text);
}

function validateScenes(raw: string): ValidationResult<number[]> {
    if (!raw.trim() || isSkip(raw)) {
        return ok([]);
    }
    const scenes: number[] = [];
    for (const part of raw.split(/[,\n]/)) {
        const token = part.trim();
        if (!token) {
            continue;
        }
        if (!/^\d+$/.test(token) || parseInt(token, 10) < 1) {
            return fail('scenes', `"${token}" is not a scene number. Use positive whole numbers, e.g. 1,2,3,4.`);
        }
        scenes.push(parseInt(token, 10));
    }
    return ok(scenes);
}

/**
 * Extracts the video id from the usual YouTube URL shapes.
 */
export function parseYoutubeLink(raw: string): YoutubeLink | null {
    const url = raw.trim();
    for (const pattern of YOUTUBE_PATTERNS) {
        const match = url.match(pattern);
        if (match) {
            const videoId = match[1];
            return { url, videoId, embedUrl: `https://www.youtube.com/embed/${videoId}` };
        }
    }
    return null;
}

function validateYoutube(raw: string): ValidationResult<YoutubeLink | null> {
    if (isSkip(raw)) {
        return ok(null);
    }
    const link = parseYoutubeLink(raw);
    if (!link) {
        return fail('youtube', 'Please provide a valid YouTube link, or type "skip" for no video.');
    }
    return ok(link);
}

function validateSource(raw: string): ValidationResult<string> {
    const text = raw.trim();
    const match = text.match(SOURCE_PATTERN);
    if (!match) {
        return fail('source', 'Please use the format Year/Month/MovieCode (e.g. 2025/08/asd5tg).');
    }
    const month = parseInt(match[2], 10);
    if (month < 1 || month > 12) {
        return fail('source', `Month must be between 1 and 12, got ${match[2]}.`);
    }
    return ok(text);
}

type FieldSchema = { [K in FieldName]: FieldSpec<K> };

const SCHEMA: FieldSchema = {
    title: {
        name: 'title',
        label: 'Title',
        prompt: 'Please enter the movie title:',
        multiplicity: 'single',
        validate: requireText('title', 'Title'),
    },
    labels: {
        name: 'labels',
        label: 'Labels',
        prompt: 'Please enter labels (comma-separated):',
        multiplicity: 'list',
        validate: validateLabels,
    },
    poster: {
        name: 'poster',
        label: 'Poster',
        prompt: 'Please enter the poster image name (e.g. MovieName):',
        multiplicity: 'single',
        validate: requireText('poster', 'Poster'),
    },
    rating: {
        name: 'rating',
        label: 'Rating',
        prompt: `Please enter the movie rating (${RATING_MIN}-${RATING_MAX}, e.g. 8.5):`,
        multiplicity: 'single',
        validate: validateRating,
    },
    review: {
        name: 'review',
        label: 'Review',
        prompt: 'Please enter your movie review:',
        multiplicity: 'single',
        validate: requireText('review', 'Review'),
    },
    scenes: {
        name: 'scenes',
        label: 'Scenes',
        prompt: 'Please enter scene numbers (comma-separated, e.g. 1,2,3,4), or "skip" for no gallery:',
        multiplicity: 'list',
        validate: validateScenes,
    },
    youtube: {
        name: 'youtube',
        label: 'YouTube',
        prompt: 'Please enter the YouTube link, or "skip" for no video:',
        multiplicity: 'single',
        validate: validateYoutube,
    },
    source: {
        name: 'source',
        label: 'Source',
        prompt: 'Please enter source data (Year/Month/MovieCode, e.g. 2025/08/asd5tg):',
        multiplicity: 'single',
        validate: validateSource,
    },
};

export const FIELD_ORDER: readonly FieldName[] = [
    'title',
    'labels',
    'poster',
    'rating',
    'review',
    'scenes',
    'youtube',
    'source',
];

export const REVIEW_FIELDS: readonly FieldSpec[] = FIELD_ORDER.map((name) => SCHEMA[name]);

const ALIASES: Record<string, FieldName> = {
    source_data: 'source',
    yt: 'youtube',
    video: 'youtube',
    label: 'labels',
    scene: 'scenes',
};

export function isFieldName(name: string): name is FieldName {
    return FIELD_ORDER.some((field) => field === name);
}

/**
 * Looks a field up by name or alias, ignoring case.
 */
export function findField(name: string): FieldSpec | null {
    const key = name.trim().toLowerCase();
    if (isFieldName(key)) {
        return SCHEMA[key];
    }
    const alias = ALIASES[key];
    return alias ? SCHEMA[alias] : null;
}

/**
 * First field in order that has no value yet.
 */
export function nextUnfilled(values: Partial<ReviewValues>): FieldSpec | null {
    return REVIEW_FIELDS.find((field) => values[field.name] === undefined) ?? null;
}

export function validateField<K extends FieldName>(spec: FieldSpec<K>, raw: string): ValidationResult<ReviewValues[K]> {
    return spec.validate(raw);
}

/**
 * Narrows partial values to a complete set once every field is present.
 */
export function isComplete(values: Partial<ReviewValues>): values is ReviewValues {
    return nextUnfilled(values) === null;
}

/**
 * Validates raw input for one field and returns the values with it stored.
 * The input values are never mutated.
 */
export function applyInput<K extends FieldName>(
    values: Partial<ReviewValues>,
    spec: FieldSpec<K>,
    raw: string
): ValidationResult<Partial<ReviewValues>> {
    const result = validateField(spec, raw);
    if (!result.ok) {
        return result;
    }
    const next: Partial<ReviewValues> = { ...values };
    next[spec.name] = result.value;
    return ok(next);
}

/**
 * Formats a stored value for chat display.
 */
export function formatFieldValue(values: Partial<ReviewValues>, name: FieldName): string {
    switch (name) {
        case 'labels':
            return values.labels ? values.labels.join(', ') : 'Not set';
        case 'scenes':
            if (!values.scenes) {
                return 'Not set';
            }
            return values.scenes.length > 0 ? values.scenes.join(', ') : 'None';
        case 'youtube':
            if (values.youtube === undefined) {
                return 'Not set';
            }
            return values.youtube ? values.youtube.url : 'Skipped';
        default:
            return values[name] ?? 'Not set';
    }
}

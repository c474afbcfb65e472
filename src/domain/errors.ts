/**
 * Domain errors. None of these are fatal to the process; each is scoped to
 * the single user operation that raised it.
 */

/**
 * Bad user input for a field. Recovered by reprompting.
 */
export class ValidationError extends Error {
    constructor(
        public readonly field: string,
        message: string
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export type TemplateErrorKind =
    | 'MissingPlaceholder'
    | 'UnknownPlaceholder'
    | 'MalformedTemplate'
    | 'MissingValue';

/**
 * Template could not be parsed or rendered.
 */
export class TemplateError extends Error {
    constructor(
        public readonly kind: TemplateErrorKind,
        message: string
    ) {
        super(message);
        this.name = 'TemplateError';
    }
}

/**
 * The blog publisher rejected or failed the post.
 */
export class PublishError extends Error {
    constructor(
        message: string,
        public readonly authRequired: boolean = false
    ) {
        super(message);
        this.name = 'PublishError';
    }
}

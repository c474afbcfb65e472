import path from 'path';
import fs from 'fs';
import { PostTemplate } from '../../domain/services/TemplateEngine';

/**
 * Reads the post template from disk and parses it.
 * Throws on a missing file or a template the engine rejects, so a bad
 * template stops the process at startup instead of at publish time.
 */
export function loadPostTemplate(templatePath: string): PostTemplate {
    const resolved = path.resolve(process.cwd(), templatePath);
    if (!fs.existsSync(resolved)) {
        throw new Error(`Template file not found: ${resolved}`);
    }

    const source = fs.readFileSync(resolved, 'utf-8');
    const template = PostTemplate.parse(source);
    console.log(`[Template] Loaded ${path.basename(resolved)} (${source.length} chars)`);
    return template;
}

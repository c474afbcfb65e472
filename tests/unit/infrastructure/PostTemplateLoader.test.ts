import fs from 'fs';
import os from 'os';
import path from 'path';
import { TemplateError } from '../../../src/domain/errors';
import { loadPostTemplate } from '../../../src/infrastructure/templates/PostTemplateLoader';

describe('loadPostTemplate', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'post-template-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads and parses the shipped template', () => {
        const templatePath = path.join(__dirname, '../../../templates/post_template.html');

        const template = loadPostTemplate(templatePath);

        expect(template.source).toBe(fs.readFileSync(templatePath, 'utf-8'));
    });

    it('fails when the file is missing', () => {
        const templatePath = path.join(dir, 'missing.html');
        expect(() => loadPostTemplate(templatePath)).toThrow(`Template file not found: ${templatePath}`);
    });

    it('fails on a template the engine rejects', () => {
        const templatePath = path.join(dir, 'broken.html');
        fs.writeFileSync(templatePath, '<h1>{{title}}</h1>{{director}}');

        expect(() => loadPostTemplate(templatePath)).toThrow(TemplateError);
    });
});

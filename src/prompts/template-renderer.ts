import Handlebars from 'handlebars';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { BUNDLED_PROMPTS_DIR } from '../config/constants';
import { ConfigError } from '../errors/index';

export type TemplateContext = Record<string, unknown>;

/**
 * Renders Handlebars prompt templates. Output is never HTML-escaped: chunk
 * text must reach the model byte for byte so that quotes can be verified.
 */
export class TemplateRenderer {
    private templateDir: string;
    private readonly compiled = new Map<string, Handlebars.TemplateDelegate>();
    private readonly handlebars = Handlebars.create();

    constructor(templateDir: string = BUNDLED_PROMPTS_DIR) {
        this.templateDir = templateDir;
        this.registerHelpers();
    }

    private registerHelpers(): void {
        this.handlebars.registerHelper('uppercase', (str: unknown) => String(str).toUpperCase());
        this.handlebars.registerHelper('lowercase', (str: unknown) => String(str).toLowerCase());
    }

    render(templateName: string, context: TemplateContext): string {
        return this.load(templateName)(context);
    }

    /** Source text of a template; part of the cache key of every request it renders. */
    source(templateName: string): string {
        const templatePath = join(this.templateDir, templateName);
        if (!existsSync(templatePath)) {
            throw new ConfigError(`Template not found: ${templatePath}`);
        }
        return readFileSync(templatePath, 'utf-8');
    }

    private load(templateName: string): Handlebars.TemplateDelegate {
        let template = this.compiled.get(templateName);
        if (!template) {
            template = this.handlebars.compile(this.source(templateName), { noEscape: true });
            this.compiled.set(templateName, template);
        }
        return template;
    }
}

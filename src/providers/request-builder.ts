// Centralized request construction for provider-agnostic use

export const VERBATIM_DIRECTIVE = [
  'Quote the source text verbatim: copy characters exactly as they appear in the cited chunk,',
  'without paraphrasing, correcting spelling or joining text from different chunks.',
  'If no passage supports a claim, answer with status "no_claim_found" and an empty claims list.',
].join(' ');

export interface RequestBuilder {
  buildPromptBodyForStructured(originalBody: string): string;
}

export class DefaultRequestBuilder implements RequestBuilder {
  private directive: string;

  constructor(directive: string = VERBATIM_DIRECTIVE) {
    this.directive = directive.trim();
  }

  buildPromptBodyForStructured(originalBody: string): string {
    const directive = this.directive ? `\n\n${this.directive}` : '';
    return originalBody + directive;
  }
}

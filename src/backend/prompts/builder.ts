/**
 * PromptBuilder - prompt composition from markdown files
 *
 * Loads markdown files from the top-level prompts/ directory and joins them with
 * markdown separators. Dynamic sections are added raw.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const PROMPTS_DIR = new URL('../../../prompts/', import.meta.url);

export class PromptBuilder {
  private sections: string[] = [];

  /**
   * Add a markdown file from the prompts/ directory
   * @param filename - Filename without path (e.g., 'agent-role.md')
   */
  addFile(filename: string): this {
    const content = readFileSync(fileURLToPath(new URL(filename, PROMPTS_DIR)), 'utf-8').trim();
    this.sections.push(content);
    return this;
  }

  /**
   * Add raw content directly (for dynamic sections like the directory listing).
   * Blank content is skipped.
   */
  addRaw(content: string): this {
    const trimmed = content.trim();
    if (trimmed) {
      this.sections.push(trimmed);
    }
    return this;
  }

  build(): string {
    return this.sections.join('\n\n---\n\n');
  }

  /**
   * Replace every occurrence of each placeholder. Values are inserted literally.
   */
  static applyReplacements(prompt: string, replacements: Record<string, string>): string {
    let result = prompt;
    for (const [placeholder, value] of Object.entries(replacements)) {
      result = result.replaceAll(placeholder, () => value);
    }
    return result;
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from './errors.js';
import { PromptBuilder, formatToolList, renderTemplate } from './prompt-builder.js';

describe('formatToolList', () => {
  it('says so when there are no tools', () => {
    expect(formatToolList([])).toBe('No tools available');
  });

  it('lists each tool with its parameter descriptions', () => {
    const list = formatToolList([
      {
        name: 'calculator',
        description: 'Do math',
        parameters: { type: 'object', properties: { expression: { type: 'string', description: 'Expression' } } },
      },
      { name: 'ping', description: 'Reply with pong', parameters: { type: 'object', properties: {} } },
    ]);

    expect(list).toBe('- calculator: Do math\n  Parameters: expression: Expression\n- ping: Reply with pong\n  Parameters: none');
  });
});

describe('renderTemplate', () => {
  it('replaces the three placeholders and nothing else', () => {
    const template = 'Tools:${tool_list} OS:${operating_system} Files:${file_list} Keep:${other}';
    expect(renderTemplate(template, { tool_list: 'T', operating_system: 'O', file_list: 'F' })).toBe(
      'Tools:T OS:O Files:F Keep:${other}'
    );
  });
});

describe('PromptBuilder', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'actloop-prompt-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('maps the platform to an OS family', () => {
    expect(new PromptBuilder({ workingDirectory: dir, platform: 'darwin' }).getOsName()).toBe('macOS');
    expect(new PromptBuilder({ workingDirectory: dir, platform: 'win32' }).getOsName()).toBe('Windows');
    expect(new PromptBuilder({ workingDirectory: dir, platform: 'linux' }).getOsName()).toBe('Linux');
    expect(new PromptBuilder({ workingDirectory: dir, platform: 'aix' }).getOsName()).toBe('Unknown');
  });

  it('lists files of the working directory, sorted and capped', () => {
    fs.writeFileSync(path.join(dir, 'b.txt'), 'b');
    fs.writeFileSync(path.join(dir, 'a.txt'), 'a');
    fs.mkdirSync(path.join(dir, 'sub'));

    expect(new PromptBuilder({ workingDirectory: dir }).getFileList()).toBe('a.txt, b.txt');
    expect(new PromptBuilder({ workingDirectory: dir, maxFiles: 1 }).getFileList()).toBe('a.txt');
  });

  it('describes an empty or unreadable directory', () => {
    expect(new PromptBuilder({ workingDirectory: dir }).getFileList()).toBe('no files');
    expect(new PromptBuilder({ workingDirectory: path.join(dir, 'missing') }).getFileList()).toBe('unavailable');
  });

  it('renders a custom template', () => {
    fs.writeFileSync(path.join(dir, 'x.md'), '# x');
    const builder = new PromptBuilder({
      workingDirectory: dir,
      platform: 'linux',
      template: 'T=${tool_list}|O=${operating_system}|F=${file_list}',
    });

    expect(builder.buildSystemPrompt([])).toBe('T=No tools available|O=Linux|F=x.md');
  });

  it('renders the built-in template', () => {
    const prompt = new PromptBuilder({ workingDirectory: dir, platform: 'linux' }).buildSystemPrompt([]);
    expect(prompt).toContain('## Available tools\nNo tools available\n');
    expect(prompt).toContain('- OS: Linux\n- Files: no files');
  });

  it('re-reads a template file when it changes', () => {
    const file = path.join(dir, 'prompt.txt');
    fs.writeFileSync(file, 'OS is ${operating_system}');
    const builder = new PromptBuilder({ workingDirectory: dir, templatePath: 'prompt.txt', platform: 'win32' });

    expect(builder.buildSystemPrompt([])).toBe('OS is Windows');

    fs.writeFileSync(file, 'Files: ${file_list}');
    const later = new Date('2030-01-01T00:00:00Z');
    fs.utimesSync(file, later, later);

    expect(builder.buildSystemPrompt([])).toBe('Files: prompt.txt');
  });

  it('rejects a template file that does not exist', () => {
    expect(() => new PromptBuilder({ workingDirectory: dir, templatePath: 'nope.txt' })).toThrow(ConfigError);
    expect(() => new PromptBuilder({ workingDirectory: dir, templatePath: 'nope.txt' })).toThrow(
      `Invalid configuration: Prompt template ${path.join(dir, 'nope.txt')} could not be read: `
    );
  });

  it('reports a template file removed after construction as a config error', () => {
    const file = path.join(dir, 'prompt.txt');
    fs.writeFileSync(file, 'hello');
    const builder = new PromptBuilder({ workingDirectory: dir, templatePath: 'prompt.txt' });
    fs.rmSync(file);

    expect(() => builder.buildSystemPrompt([])).toThrow(ConfigError);
  });
});

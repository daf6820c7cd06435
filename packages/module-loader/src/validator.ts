/**
 * cmdtree Module Loader — Manifest Validator
 *
 * Turns an unknown value (parsed JSON, a typed constant) into a
 * ModuleManifest, or into the full list of problems with it. Validation is
 * exhaustive: it does not stop at the first error, so a module author sees
 * everything wrong with a manifest in one pass.
 */

import { PATH_SEPARATOR, splitPath } from '@cmdtree/kernel';
import type { ValidationError, ValidationResult } from '@cmdtree/kernel';
import type { CommandDeclaration, ModuleManifest } from './manifest.js';

const MODULE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const VERSION_PATTERN = /^\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?$/;
/** Command names and aliases are typed by users: no whitespace. */
const TOKEN_PATTERN = /^\S+$/;

const MANIFEST_KEYS: ReadonlySet<string> = new Set([
  'module_id',
  'module_name',
  'version',
  'description',
  'path',
  'prefix',
  'essential',
  'enabled',
  'commands',
]);

const COMMAND_KEYS: ReadonlySet<string> = new Set([
  'name',
  'aliases',
  'prefix',
  'priority',
  'overrideable',
  'essential',
  'description',
  'usage',
  'reply',
]);

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

/**
 * Reads fields of one JSON object and collects errors under a context label.
 * Each reader returns undefined when the field is absent or invalid.
 */
class FieldReader {
  private readonly fields: ReadonlyMap<string, unknown>;

  constructor(
    value: object,
    private readonly context: string,
    private readonly errors: ValidationError[],
    known: ReadonlySet<string>,
  ) {
    this.fields = new Map<string, unknown>(Object.entries(value));
    for (const key of this.fields.keys()) {
      if (!known.has(key)) this.fail(`Unknown field "${key}".`);
    }
  }

  fail(message: string): void {
    this.errors.push({ message, context: this.context });
  }

  has(key: string): boolean {
    return this.fields.get(key) !== undefined;
  }

  raw(key: string): unknown {
    return this.fields.get(key);
  }

  string(key: string, required: boolean, pattern?: RegExp): string | undefined {
    const value = this.fields.get(key);
    if (value === undefined) {
      if (required) this.fail(`Missing required field "${key}".`);
      return undefined;
    }
    if (typeof value !== 'string' || value === '') {
      this.fail(`"${key}" must be a non-empty string.`);
      return undefined;
    }
    if (pattern !== undefined && !pattern.test(value)) {
      this.fail(`"${key}" has an invalid format: "${value}".`);
      return undefined;
    }
    return value;
  }

  boolean(key: string): boolean | undefined {
    const value = this.fields.get(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
      this.fail(`"${key}" must be a boolean.`);
      return undefined;
    }
    return value;
  }

  integer(key: string): number | undefined {
    const value = this.fields.get(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      this.fail(`"${key}" must be an integer.`);
      return undefined;
    }
    return value;
  }

  /** Plain strings, including empty ones (description, usage, reply). */
  text(key: string): string | undefined {
    const value = this.fields.get(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      this.fail(`"${key}" must be a string.`);
      return undefined;
    }
    return value;
  }
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

export class ModuleValidator {
  /**
   * Validate an unknown value as a ModuleManifest.
   *
   * Checks:
   * - module_id, module_name, version, description, path are present strings;
   *   module_id is a simple identifier and version is semver;
   * - path is absolute and every segment is a valid namespace name;
   * - optional prefix, essential and enabled have the right types;
   * - commands is an array of valid declarations with distinct names.
   *
   * @returns the typed manifest, or every error found
   */
  validateManifest(manifest: unknown): ValidationResult<ModuleManifest> {
    if (!isObject(manifest)) {
      return { ok: false, errors: [{ message: 'Manifest must be a JSON object.' }] };
    }

    const errors: ValidationError[] = [];
    const rawId = 'module_id' in manifest ? manifest.module_id : undefined;
    const label = typeof rawId === 'string' && rawId !== '' ? `module ${rawId}` : 'module';
    const fields = new FieldReader(manifest, label, errors, MANIFEST_KEYS);

    const moduleId = fields.string('module_id', true, MODULE_ID_PATTERN);
    const moduleName = fields.string('module_name', true);
    const version = fields.string('version', true, VERSION_PATTERN);
    const description = fields.text('description');
    if (!fields.has('description')) fields.fail('Missing required field "description".');
    const path = this.validatePath(fields);
    const prefix = fields.string('prefix', false);
    const essential = fields.boolean('essential');
    const enabled = fields.boolean('enabled');
    if (enabled === false && (essential === true || path === PATH_SEPARATOR)) {
      fields.fail('An essential or root module cannot start disabled.');
    }
    const commands = this.validateCommands(fields.raw('commands'), label, errors);

    if (
      errors.length > 0 ||
      moduleId === undefined ||
      moduleName === undefined ||
      version === undefined ||
      description === undefined ||
      path === undefined ||
      commands === undefined
    ) {
      return { ok: false, errors };
    }

    return {
      ok: true,
      value: {
        module_id: moduleId,
        module_name: moduleName,
        version,
        description,
        path,
        prefix,
        essential,
        enabled,
        commands,
      },
    };
  }

  /**
   * Validate one command declaration.
   *
   * @returns the typed declaration, or undefined with errors appended
   */
  validateCommand(value: unknown, context: string, errors: ValidationError[]): CommandDeclaration | undefined {
    if (!isObject(value)) {
      errors.push({ message: 'Command declaration must be an object.', context });
      return undefined;
    }
    const before = errors.length;
    const fields = new FieldReader(value, context, errors, COMMAND_KEYS);

    const name = fields.string('name', true, TOKEN_PATTERN);
    const aliases = this.validateAliases(fields);
    const prefix = fields.string('prefix', false);
    const priority = fields.integer('priority');
    const overrideable = fields.boolean('overrideable');
    const essential = fields.boolean('essential');
    const description = fields.text('description');
    const usage = fields.text('usage');
    const reply = fields.text('reply');

    if (errors.length > before || name === undefined) return undefined;
    return { name, aliases, prefix, priority, overrideable, essential, description, usage, reply };
  }

  private validatePath(fields: FieldReader): string | undefined {
    const path = fields.string('path', true);
    if (path === undefined) return undefined;
    if (!path.startsWith(PATH_SEPARATOR)) {
      fields.fail(`"path" must start with "${PATH_SEPARATOR}": "${path}".`);
      return undefined;
    }
    const trimmed = path.length > 1 && path.endsWith(PATH_SEPARATOR) ? path.slice(0, -1) : path;
    if (trimmed !== PATH_SEPARATOR && trimmed.slice(1).split(PATH_SEPARATOR).includes('')) {
      fields.fail(`"path" contains an empty segment: "${path}".`);
      return undefined;
    }
    return PATH_SEPARATOR + splitPath(path).join(PATH_SEPARATOR);
  }

  private validateAliases(fields: FieldReader): ReadonlyArray<string> | undefined {
    const raw = fields.raw('aliases');
    if (raw === undefined) return undefined;
    if (!Array.isArray(raw) || raw.length === 0) {
      fields.fail('"aliases" must be a non-empty array of strings.');
      return undefined;
    }
    const aliases: string[] = [];
    for (const alias of raw) {
      if (typeof alias !== 'string' || !TOKEN_PATTERN.test(alias)) {
        fields.fail(`Invalid alias ${JSON.stringify(alias)}: aliases are non-empty and contain no whitespace.`);
        return undefined;
      }
      aliases.push(alias);
    }
    return aliases;
  }

  private validateCommands(
    raw: unknown,
    label: string,
    errors: ValidationError[],
  ): ReadonlyArray<CommandDeclaration> | undefined {
    if (!Array.isArray(raw)) {
      errors.push({ message: '"commands" must be an array.', context: label });
      return undefined;
    }
    const commands: CommandDeclaration[] = [];
    const names = new Set<string>();
    let valid = true;
    raw.forEach((entry: unknown, i) => {
      const command = this.validateCommand(entry, `${label}, commands[${i}]`, errors);
      if (command === undefined) {
        valid = false;
        return;
      }
      if (names.has(command.name)) {
        errors.push({ message: `Duplicate command name "${command.name}".`, context: `${label}, commands[${i}]` });
        valid = false;
        return;
      }
      names.add(command.name);
      commands.push(command);
    });
    return valid ? commands : undefined;
  }
}

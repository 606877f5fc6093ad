/**
 * ConfigFileService - the admin JSON editor over a whitelist of config files
 *
 * Only global/{roles,permissions,assignments}.json and
 * seasons/<id>/{season,users}.json are reachable. Writes are validated with
 * the same schemas the loader uses, written atomically and followed by a
 * full reload under the store's write lock.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { createLogger } from "../../../src/core/Logger.js";
import { isNotFound, readJsonFile, writeJsonAtomic } from "../../lib/utils/jsonFile.js";
import { ConfigNotFoundError, ConfigValidationError } from "../../lib/utils/errors.js";
import { AssignmentsFileSchema, PermissionsFileSchema, RolesFileSchema, SeasonFileSchema, parseRoster, parseWith } from "../models/schemas.js";
import type { LoadReport } from "../models/types.js";
import type { ConfigStore } from "./ConfigStore.js";

const log = createLogger("roster:files");

type Validator = (value: unknown, source: string) => void;

const GLOBAL_FILES: Record<string, Validator> = {
  "roles.json": (value, source) => void parseWith(RolesFileSchema, value, source),
  "permissions.json": (value, source) => void parseWith(PermissionsFileSchema, value, source),
  "assignments.json": (value, source) => void parseWith(AssignmentsFileSchema, value, source),
};

const SEASON_FILES: Record<string, Validator> = {
  "season.json": (value, source) => void parseWith(SeasonFileSchema, value, source),
  "users.json": (value, source) => void parseRoster(value, source),
};

const GLOBAL_PATTERN = /^global\/([a-z]+\.json)$/;
const SEASON_PATTERN = /^seasons\/([A-Za-z0-9_-]{1,64})\/([a-z]+\.json)$/;

export interface ConfigFileInfo {
  path: string;
  size: number;
  modifiedAt: string;
}

interface EditableFile {
  relative: string;
  validate: Validator;
}

/**
 * Map a request path onto a whitelisted file, or null
 */
export function resolveEditableFile(requested: string): EditableFile | null {
  const relative = path.posix.normalize(requested.replace(/\\/g, "/").replace(/^\/+/, ""));

  const globalMatch = GLOBAL_PATTERN.exec(relative);
  if (globalMatch?.[1]) {
    const validate = GLOBAL_FILES[globalMatch[1]];
    return validate ? { relative, validate } : null;
  }

  const seasonMatch = SEASON_PATTERN.exec(relative);
  if (seasonMatch?.[2]) {
    const validate = SEASON_FILES[seasonMatch[2]];
    return validate ? { relative, validate } : null;
  }

  return null;
}

export class ConfigFileService {
  constructor(private readonly store: ConfigStore) {}

  private editable(requested: string): EditableFile {
    const file = resolveEditableFile(requested);
    if (!file) {
      throw new ConfigValidationError("file path", [{ path: "path", message: `${requested} is not an editable config file` }]);
    }
    return file;
  }

  /**
   * Every whitelisted file that currently exists
   */
  async listFiles(): Promise<ConfigFileInfo[]> {
    const candidates = Object.keys(GLOBAL_FILES).map((name) => `global/${name}`);

    let seasonDirs: string[] = [];
    try {
      const dirents = await fs.readdir(this.store.resolve("seasons"), { withFileTypes: true });
      seasonDirs = dirents.filter((d) => d.isDirectory()).map((d) => d.name);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
    for (const dir of seasonDirs.sort()) {
      for (const name of Object.keys(SEASON_FILES)) {
        candidates.push(`seasons/${dir}/${name}`);
      }
    }

    const files: ConfigFileInfo[] = [];
    for (const relative of candidates) {
      if (!resolveEditableFile(relative)) continue;
      try {
        const stat = await fs.stat(this.store.resolve(relative));
        files.push({ path: relative, size: stat.size, modifiedAt: stat.mtime.toISOString() });
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
    return files;
  }

  async readFile(requested: string): Promise<{ path: string; content: unknown }> {
    const { relative } = this.editable(requested);
    const content = await readJsonFile(this.store.resolve(relative));
    if (content === undefined) {
      throw new ConfigNotFoundError(relative);
    }
    return { path: relative, content };
  }

  /**
   * Validate, write and reload. Returns the load report of the reload.
   */
  async writeFile(requested: string, content: unknown, actor: string): Promise<LoadReport> {
    const { relative, validate } = this.editable(requested);
    validate(content, relative);

    return this.store.lock.write(async () => {
      await writeJsonAtomic(this.store.resolve(relative), content);
      log.info(`${actor} updated ${relative}`);
      return this.store.loadAll();
    });
  }
}

/**
 * File-backed inputs for the loader: the index document and a directory
 * of per-repository metadata overrides.
 */
import * as path from 'node:path';
import { readFile, fileExists, globFiles, isDirectory } from '../../utils/file-system.js';
import { parseYaml } from '../../utils/yaml.js';
import { ErrorCodes, MalformedMetadataError, SystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('reader');

const OVERRIDE_PATTERNS = ['*/metadata.yml', '*/metadata.yaml'];

async function readDocument(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${filePath}`, { filePath });
  }
  const content = await readFile(filePath);
  try {
    return parseYaml(content);
  } catch (error) {
    throw new MalformedMetadataError(
      ErrorCodes.UNPARSABLE_DOCUMENT,
      `${filePath} is not a well-formed document: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }
}

/**
 * Read an ecosystem index (JSON or YAML).
 */
export async function readIndexFile(filePath: string): Promise<unknown> {
  return readDocument(path.resolve(filePath));
}

/**
 * Read `<dir>/<repo>/metadata.yml` files into a name→descriptor mapping.
 * The directory name is the repository name. Empty files are skipped.
 */
export async function readOverridesDir(dir: string): Promise<Record<string, unknown>> {
  const root = path.resolve(dir);
  if (!(await isDirectory(root))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Overrides directory not found: ${root}`, { dir: root });
  }

  const files = await globFiles(OVERRIDE_PATTERNS, { cwd: root, deep: 2 });
  const overrides: Record<string, unknown> = {};

  for (const file of files) {
    const name = path.dirname(file);
    if (name in overrides) {
      log.warn(`Multiple metadata files for '${name}'; using ${file}`);
    }
    const document = await readDocument(path.join(root, file));
    if (document === null || document === undefined) {
      log.debug(`Skipping empty metadata file ${file}`);
      continue;
    }
    overrides[name] = document;
  }

  log.debug(`Read ${Object.keys(overrides).length} metadata overrides from ${root}`);
  return overrides;
}

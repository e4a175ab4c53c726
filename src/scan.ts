import fs from "fs";
import path from "path";
import { AUDIO_EXTENSIONS } from "./config";
import { ProgressReporter } from "./progress";

const fsp = fs.promises;

/**
 * Lower-cased extension of a path, including the dot. Unlike `path.extname`,
 * a name made only of an extension (`.mp3`) counts as having one.
 */
export function fileExtension(filePath: string): string {
  const base = path.basename(filePath);
  const dot = base.lastIndexOf(".");
  return dot === -1 ? "" : base.slice(dot).toLowerCase();
}

/**
 * Resolves symbolic links in the root path and checks that it is a directory.
 *
 * @returns The canonical absolute path of the directory
 * @throws Error if the path cannot be resolved or is not a directory
 */
export async function resolveRoot(dirPath: string): Promise<string> {
  let resolved: string;
  try {
    resolved = await fsp.realpath(dirPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Error resolving path: ${message}`);
  }

  const stats = await fsp.stat(resolved);
  if (!stats.isDirectory()) {
    throw new Error(`Provided path is not a directory: ${resolved}`);
  }

  return resolved;
}

/**
 * Recursively walks a directory tree and invokes a callback for each regular file.
 *
 * Entries are visited in name order, so the same tree always yields the same
 * sequence. Symbolic links to files are reported; symbolic links to
 * directories are not followed. Unreadable directories are logged to stderr
 * and skipped.
 *
 * @param rootDir - Absolute path to directory to walk
 * @param onFile - Async callback invoked with absolute path of each file found
 *
 * @example
 * await walkDirectory('/path/to/music', async (filePath) => {
 *   console.log(`Found: ${filePath}`);
 * });
 */
export async function walkDirectory(
  rootDir: string,
  onFile: (filePath: string) => Promise<void>
): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error reading directory: ${rootDir}: ${message}`);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(rootDir, entry.name);

    if (entry.isSymbolicLink()) {
      let target: fs.Stats;
      try {
        target = await fsp.stat(fullPath);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Warning: skipping ${fullPath}: ${message}`);
        continue;
      }
      if (target.isFile()) {
        await onFile(fullPath);
      }
      continue;
    }

    if (entry.isDirectory()) {
      await walkDirectory(fullPath, onFile);
      continue;
    }

    if (entry.isFile()) {
      await onFile(fullPath);
    }
  }
}

/**
 * Collects the audio files under a directory in discovery order.
 *
 * @param rootDir - Absolute path to directory to scan
 * @param extensions - Extensions to keep, with the leading dot. Matching is
 *   case-insensitive.
 * @param progress - Optional progress reporter for UI feedback
 * @returns Paths of matching files; a file's position is its job index
 *
 * @example
 * const files = await collectAudioFiles('/path/to/music');
 * console.log(`${files.length} audio files`);
 */
export async function collectAudioFiles(
  rootDir: string,
  extensions: string[] = AUDIO_EXTENSIONS,
  progress?: ProgressReporter
): Promise<string[]> {
  const extSet = new Set(extensions.map((ext) => ext.toLowerCase()));
  const files: string[] = [];

  progress?.startScanning();

  await walkDirectory(rootDir, async (filePath) => {
    const ext = fileExtension(filePath);
    if (!extSet.has(ext)) {
      return;
    }

    files.push(filePath);
    progress?.updateScanning(files.length);
  });

  progress?.endScanning(files.length);

  return files;
}

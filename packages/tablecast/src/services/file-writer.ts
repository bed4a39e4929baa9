/**
 * File Writer
 *
 * The output sink: writes emitted units under the output directory, one at a
 * time. Existing files are replaced, unless overwriting needs confirmation
 * and the user declines, which skips the file without failing the run.
 */
import { Effect } from "effect";
import { FileSystem, Path } from "@effect/platform";
import type { EmittedUnit } from "../emit/unit.js";
import { WriteError } from "../errors.js";

/**
 * Asks whether an existing file may be replaced
 */
export type ConfirmOverwrite = (path: string) => Effect.Effect<boolean>;

export interface WriteOptions {
  readonly outputDir: string;
  /** Replace existing files without asking (default: true) */
  readonly force?: boolean;
  /** Report what would be written without touching the disk */
  readonly dryRun?: boolean;
  /** Consulted for existing files when `force` is false; declines by default */
  readonly confirmOverwrite?: ConfirmOverwrite;
}

export interface WriteResult {
  readonly path: string;
  readonly written: boolean;
  readonly reason?: "dry-run" | "declined";
}

export interface FileWriter {
  readonly write: (
    unit: EmittedUnit,
    options: WriteOptions,
  ) => Effect.Effect<WriteResult, WriteError, FileSystem.FileSystem | Path.Path>;
}

const declineOverwrite: ConfirmOverwrite = () => Effect.succeed(false);

const writeFailed = (path: string, action: string) => (cause: unknown) =>
  new WriteError({
    message: `Failed to ${action} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
    path,
    cause,
  });

export function createFileWriter(): FileWriter {
  const write: FileWriter["write"] = (unit, options) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const pathSvc = yield* Path.Path;
      const target = pathSvc.join(options.outputDir, unit.path);

      if (options.dryRun) {
        return { path: target, written: false, reason: "dry-run" } satisfies WriteResult;
      }

      if (!(options.force ?? true)) {
        const exists = yield* fs.exists(target).pipe(Effect.mapError(writeFailed(target, "check")));
        if (exists) {
          const confirm = options.confirmOverwrite ?? declineOverwrite;
          if (!(yield* confirm(target))) {
            yield* Effect.logWarning(`Skipped ${target}`);
            return { path: target, written: false, reason: "declined" } satisfies WriteResult;
          }
        }
      }

      yield* fs
        .makeDirectory(pathSvc.dirname(target), { recursive: true })
        .pipe(Effect.mapError(writeFailed(pathSvc.dirname(target), "create directory")));
      yield* fs.writeFileString(target, unit.content).pipe(Effect.mapError(writeFailed(target, "write")));
      yield* Effect.logDebug(`✓ ${target}`);

      return { path: target, written: true } satisfies WriteResult;
    });

  return { write };
}

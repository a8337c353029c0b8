import type { BlobStore } from "../clients/s3Client";
import type { YtDlpClient } from "../clients/ytDlpClient";
import type { Database } from "../db/client";
import { PipelineFatalError } from "./errors";

export interface SentinelTargets {
  blobStore: BlobStore;
  database?: Database | null;
  /** Reaches the content source once; failures only warn */
  sourceCheck?: { label: string; run: () => Promise<unknown> } | null;
  ytDlp?: YtDlpClient | null;
}

/**
 * Verifies that external infrastructure is reachable before any item is touched.
 * The object store (and the run-history database, when configured) are critical;
 * the content source and yt-dlp only produce warnings.
 * @throws PipelineFatalError if a critical check fails
 */
export async function runSentinelCheck(targets: SentinelTargets): Promise<void> {
  console.log(
    `[${new Date().toLocaleTimeString()}] 🛡️ Running Sentinel Infrastructure Check...`
  );

  // --- CRITICAL: Object store ---
  try {
    await targets.blobStore.verifyAccess();
    console.log(`    ✅ Object store: bucket '${targets.blobStore.bucket}' reachable`);
  } catch (err: unknown) {
    throw new PipelineFatalError(
      `CRITICAL: Object store unreachable. Stopping job. (${messageOf(err)})`,
      { cause: err }
    );
  }

  // --- CRITICAL (when configured): Database ---
  if (targets.database) {
    try {
      await targets.database.query("SELECT 1");
      console.log(`    ✅ Database: Reachable`);
    } catch (err: unknown) {
      throw new PipelineFatalError(
        `CRITICAL: Database unreachable. Stopping job. (${messageOf(err)})`,
        { cause: err }
      );
    }
  }

  // --- NON-CRITICAL: Content source ---
  if (targets.sourceCheck) {
    try {
      await targets.sourceCheck.run();
      console.log(`    ✅ ${targets.sourceCheck.label}: Reachable`);
    } catch (err: unknown) {
      console.warn(`    ⚠️  WARNING: ${targets.sourceCheck.label} health check failed.`);
      console.warn("   Items already staged can still be processed and uploaded.");
      console.warn(`   Reason: ${messageOf(err)}`);
    }
  }

  // --- NON-CRITICAL: yt-dlp ---
  if (targets.ytDlp) {
    try {
      const version = await targets.ytDlp.version();
      console.log(`    ✅ yt-dlp: ${version}`);
    } catch (err: unknown) {
      console.warn("    ⚠️  WARNING: yt-dlp is not available.");
      console.warn("   YouTube items will fail until it is installed.");
      console.warn(`   Reason: ${messageOf(err)}`);
    }
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : JSON.stringify(err);
}

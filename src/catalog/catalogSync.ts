import { CATALOG_KEY, type BlobStore } from "../clients/s3Client";
import { pathExists } from "../utils/files";
import { CatalogStore } from "./catalogStore";

/**
 * Opens the catalog: the local file when there is one, otherwise the copy kept in
 * the object store, otherwise an empty catalog.
 * @throws PipelineFatalError if the copy found is corrupt
 */
export async function loadCatalog(
  catalogPath: string,
  blobStore: BlobStore,
  now?: () => Date
): Promise<CatalogStore> {
  if (await pathExists(catalogPath)) {
    return CatalogStore.load(catalogPath, now);
  }

  const remote = await blobStore.getText(CATALOG_KEY);
  if (remote === null) {
    console.log(`[Catalog] No catalog at ${catalogPath} or ${CATALOG_KEY}; starting empty`);
    return new CatalogStore(catalogPath, undefined, now);
  }

  console.log(`[Catalog] Restored ${catalogPath} from s3://${blobStore.bucket}/${CATALOG_KEY}`);
  const store = CatalogStore.fromJson(`s3://${blobStore.bucket}/${CATALOG_KEY}`, remote, now);
  const local = new CatalogStore(catalogPath, store.toDocument(), now);
  await local.save();
  return local;
}

/**
 * Saves the catalog locally, then replaces the object-store copy.
 */
export async function publishCatalog(store: CatalogStore, blobStore: BlobStore): Promise<void> {
  await store.save();
  await blobStore.putText(CATALOG_KEY, store.serialize(), "application/json");
}

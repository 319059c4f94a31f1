export interface StorageRelayOptions {
    /** Public id for the stored asset; the storage provider picks one otherwise */
    publicId?: string;
}

/**
 * IStorageRelay - Port for copying a generated artifact to our own storage.
 * Implementations: CloudinaryStorageRelay
 */
export interface IStorageRelay {
    /**
     * Copies the resource at sourceUrl and returns the URL it is served from.
     * @throws StorageError when the copy fails
     */
    upload(sourceUrl: string, options?: StorageRelayOptions): Promise<string>;
}

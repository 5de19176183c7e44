export type DigestAlgorithm = "sha1" | "sha256";

export type FileHash = {
  algorithm: DigestAlgorithm;
  value: string;
};

export interface FileHasher {
  readonly algorithm: DigestAlgorithm;
  hashFile(absolutePath: string): Promise<FileHash>;
}

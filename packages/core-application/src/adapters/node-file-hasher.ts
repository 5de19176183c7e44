import { createHash } from "crypto";
import { createReadStream } from "fs";
import type { DigestAlgorithm, FileHasher, FileHash } from "../ports/file-hasher";

export class NodeFileHasher implements FileHasher {
  constructor(public readonly algorithm: DigestAlgorithm = "sha1") {}

  async hashFile(absolutePath: string): Promise<FileHash> {
    const algo = this.algorithm;

    return new Promise((resolve, reject) => {
      const hash = createHash(algo);
      const stream = createReadStream(absolutePath);

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", reject);
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}

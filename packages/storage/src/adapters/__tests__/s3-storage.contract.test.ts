import { FakeClock } from "@bucket-index/clock"
import { describeStorageContract } from "../../ports/__tests__/storage.contract"
import { createStubS3Client, respondFromMemory } from "../../tests/utils/stub-s3-client"
import { MemoryStorage } from "../memory-storage"
import { S3Storage } from "../s3-storage"

describeStorageContract({
  name: "S3Storage",
  make: () => {
    const clock = new FakeClock(1_700_000_000_000)
    const backing = new MemoryStorage({ clock })
    const { client } = createStubS3Client(respondFromMemory(backing))

    return {
      storage: new S3Storage({ client, clock }),
      seed: (bucket, objects) => backing.seed(bucket, objects),
    }
  },
})

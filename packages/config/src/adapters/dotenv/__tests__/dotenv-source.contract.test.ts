import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  make: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "BUCKET=media\nPORT=8000\n")

    return new DotenvSource({ file: ".env", required: true, cwd })
  },
  expected: { BUCKET: "media", PORT: "8000" },
})

import { describeByteSourceContract } from "../../../ports/__tests__/byte-source.contract"
import { BufferSource } from "../buffer-source"

describeByteSourceContract({
  name: "BufferSource",
  make: (bytes) => new BufferSource(bytes),
})

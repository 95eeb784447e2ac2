import { describeByteSinkContract } from "../../../ports/__tests__/byte-sink.contract"
import { BufferSink } from "../buffer-sink"

describeByteSinkContract({
  name: "BufferSink",
  make: () => {
    const sink = new BufferSink()
    return { sink, written: () => sink.toBytes() }
  },
})

import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async () => ({
    source: new EnvSource({ env: { START_MASK: "50000" } }),
  }),
  setup: async () => {},
  expectedValue: () => ({ START_MASK: "50000" }),
})

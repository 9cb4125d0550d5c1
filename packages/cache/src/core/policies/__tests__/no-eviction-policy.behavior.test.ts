import { NoEvictionPolicy } from "../no-eviction-policy"

describe("NoEvictionPolicy (behavior)", () => {
  let policy: NoEvictionPolicy<string>

  beforeEach(() => {
    policy = new NoEvictionPolicy()
    policy.insert("a")
    policy.insert("b")
    policy.insert("c")
  })

  it("candidate is the earliest tracked key still present", () => {
    expect(policy.replacementCandidate()).toBe("a")

    policy.erase("a")

    expect(policy.replacementCandidate()).toBe("b")
  })

  it("touch has no effect", () => {
    policy.touch("a")

    expect(policy.replacementCandidate()).toBe("a")
    expect(policy.size()).toBe(3)
  })
})

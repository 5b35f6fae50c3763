import type { ReadContext, WriteContext } from "../../../ports/contexts"
import { sessionHarness } from "../../__tests__/session-harness"
import { decodePreservingSharedIdentity, encodePreservingSharedIdentityOf } from "../shared-identity"

type Node = { label: string; children: Node[] }

function isNode(value: unknown): value is Node {
  return typeof value === "object" && value !== null && "label" in value && "children" in value
}

async function writeNode(ctx: WriteContext, node: Node): Promise<void> {
  await encodePreservingSharedIdentityOf(ctx, node, async (n) => {
    ctx.writeString(n.label)
    ctx.writeSmallInt(n.children.length)
    for (const child of n.children) await writeNode(ctx, child)
  })
}

async function readNode(ctx: ReadContext): Promise<Node> {
  return decodePreservingSharedIdentity(ctx, isNode, async () => {
    const label = ctx.readString()
    const count = ctx.readSmallInt()
    const children: Node[] = []
    for (let i = 0; i < count; i++) children.push(await readNode(ctx))
    return { label, children }
  })
}

describe("shared identity", () => {
  const harness = sessionHarness()

  it("writes the body once and the id on later encounters", async () => {
    const leaf: Node = { label: "leaf", children: [] }
    const ctx = harness.writer()

    await writeNode(ctx, leaf)
    await writeNode(ctx, leaf)

    expect([...ctx.toBytes()]).toEqual([0, 4, 0x6c, 0x65, 0x61, 0x66, 0, 0])
    expect(ctx.sharedIdentities.size).toBe(1)
  })

  it("assigns ids in the order instances are first written", async () => {
    const shared: Node = { label: "shared", children: [] }
    const root: Node = { label: "root", children: [shared, { label: "other", children: [] }] }
    const ctx = harness.writer()

    await writeNode(ctx, root)

    expect(ctx.sharedIdentities.getId(root)).toBe(0)
    expect(ctx.sharedIdentities.getId(shared)).toBe(1)
    expect(ctx.sharedIdentities.getId(root.children[1])).toBe(2)
  })

  it("restores aliases as the same instance and keeps distinct instances distinct", async () => {
    const shared: Node = { label: "shared", children: [] }
    const twin: Node = { label: "shared", children: [] }
    const root: Node = { label: "root", children: [shared, twin, shared] }
    const write = harness.writer()
    await writeNode(write, root)

    const restored = await readNode(harness.reader(write.toBytes()))

    const [first, second, third] = restored.children
    expect(first).toBe(third)
    expect(first).not.toBe(second)
    expect(second).toEqual(first)
  })

  it("rejects an id that skips ahead", async () => {
    const ctx = harness.reader(new Uint8Array([1]))

    await expect(readNode(ctx)).rejects.toMatchObject({
      code: "shared-identity-violation",
      context: { id: 1, expected: 0 },
    })
  })

  it("rejects a reference to an instance that is still being decoded", async () => {
    // root (id 0) with one child that refers back to id 0
    const ctx = harness.reader(new Uint8Array([0, 1, 0x72, 1, 0]))

    await expect(readNode(ctx)).rejects.toMatchObject({
      code: "shared-identity-violation",
      message: "Id 0 refers to an instance that is still being decoded",
    })
  })

  it("rejects an id that refers to an instance of another kind", async () => {
    const ctx = harness.reader(new Uint8Array([0, 0]))
    const decodeString = () =>
      decodePreservingSharedIdentity(ctx, (v): v is string => typeof v === "string", async () => "x")

    await decodeString()

    await expect(readNode(ctx)).rejects.toMatchObject({
      code: "shared-identity-violation",
      context: { id: 0 },
    })
  })
})

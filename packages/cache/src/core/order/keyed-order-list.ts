type OrderNode<K> = {
  readonly key: K
  prev: OrderNode<K> | undefined
  next: OrderNode<K> | undefined
}

/**
 * Doubly-linked list of unique keys with a key-to-node index, so removing or
 * moving any key is O(1). The front is the newest position.
 */
export class KeyedOrderList<K> {
  private readonly index = new Map<K, OrderNode<K>>()
  private head: OrderNode<K> | undefined
  private tail: OrderNode<K> | undefined

  get size(): number {
    return this.index.size
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  /**
   * @returns false, leaving the list unchanged, if `key` is already present
   */
  pushFront(key: K): boolean {
    if (this.index.has(key)) return false

    const node: OrderNode<K> = { key, prev: undefined, next: undefined }

    this.linkFront(node)
    this.index.set(key, node)

    return true
  }

  remove(key: K): boolean {
    const node = this.index.get(key)

    if (node === undefined) return false

    this.unlink(node)
    this.index.delete(key)

    return true
  }

  moveToFront(key: K): boolean {
    const node = this.index.get(key)

    if (node === undefined) return false
    if (node === this.head) return true

    this.unlink(node)
    this.linkFront(node)

    return true
  }

  front(): { readonly key: K } | undefined {
    return this.head
  }

  back(): { readonly key: K } | undefined {
    return this.tail
  }

  /**
   * Keys from front (newest) to back (oldest).
   */
  *keys(): IterableIterator<K> {
    for (let node = this.head; node !== undefined; node = node.next) {
      yield node.key
    }
  }

  private linkFront(node: OrderNode<K>): void {
    node.prev = undefined
    node.next = this.head

    if (this.head) this.head.prev = node
    else this.tail = node

    this.head = node
  }

  private unlink(node: OrderNode<K>): void {
    if (node.prev) node.prev.next = node.next
    else this.head = node.next

    if (node.next) node.next.prev = node.prev
    else this.tail = node.prev

    node.prev = undefined
    node.next = undefined
  }
}

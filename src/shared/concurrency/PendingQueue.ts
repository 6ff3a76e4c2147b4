interface Node<T> {
  item: T;
  next: Node<T> | undefined;
}

/**
 * 无界 FIFO 队列
 *
 * 链表实现，push 与 tryPop 均为 O(1)。
 */
export class PendingQueue<T> {
  private head: Node<T> | undefined;
  private tail: Node<T> | undefined;
  private size = 0;

  push(item: T): void {
    const node: Node<T> = { item, next: undefined };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.size++;
  }

  /**
   * 弹出队首元素，队列为空时返回 undefined
   */
  tryPop(): T | undefined {
    const node = this.head;
    if (!node) {
      return undefined;
    }

    this.head = node.next;
    if (!this.head) {
      this.tail = undefined;
    }
    this.size--;
    return node.item;
  }

  /**
   * 按入队顺序取出全部元素并清空队列
   */
  drain(): T[] {
    const items: T[] = [];
    for (let node = this.head; node; node = node.next) {
      items.push(node.item);
    }
    this.head = undefined;
    this.tail = undefined;
    this.size = 0;
    return items;
  }

  get length(): number {
    return this.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }
}

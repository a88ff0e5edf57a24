/**
 * 有界缓冲区实现
 * Bounded buffer implementation
 *
 * 最新的元素在最前面，超出容量时从尾部淘汰最旧的元素
 * Newest element first; once capacity is exceeded the oldest are evicted from the tail
 */

/**
 * 通用的有界缓冲区类
 * Generic newest-first bounded buffer
 *
 * @example
 * const alerts = new CircularBuffer<Alert>(50)
 * alerts.pushFront(alert)
 * const latest = alerts.getFirst(10) // 最新的10条
 */
export class CircularBuffer<T> {
  private buffer: T[] = []
  private readonly maxSize: number

  /**
   * @param maxSize - 缓冲区的最大容量 / Maximum capacity of the buffer
   * @param initial - 初始元素（按新到旧排列）/ Initial items, newest first
   */
  constructor(maxSize: number, initial: readonly T[] = []) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError('缓冲区大小必须是正整数 / Buffer size must be a positive integer')
    }
    this.maxSize = maxSize
    this.buffer = initial.slice(0, maxSize)
  }

  /**
   * 添加元素到最前面并截断到容量
   * Prepend an element, then truncate to capacity
   *
   * @returns 被淘汰的元素 / Evicted elements
   */
  pushFront(item: T): T[] {
    this.buffer.unshift(item)
    if (this.buffer.length > this.maxSize) {
      return this.buffer.splice(this.maxSize)
    }
    return []
  }

  /**
   * 获取最前面的N个元素（N 大于长度时返回全部）
   * Get the first N elements; the whole buffer when N exceeds its size
   */
  getFirst(count: number): T[] {
    const safeCount = Number.isFinite(count) ? Math.max(0, Math.trunc(count)) : 0
    return this.buffer.slice(0, safeCount)
  }

  getAll(): T[] {
    return [...this.buffer]
  }

  size(): number {
    return this.buffer.length
  }

  capacity(): number {
    return this.maxSize
  }

  clear(): void {
    this.buffer = []
  }

  isFull(): boolean {
    return this.buffer.length >= this.maxSize
  }
}

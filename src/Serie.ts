/**
 * A flat array read as consecutive items of `itemSize` numbers, such as
 * 2D/3D positions or triangle indices.
 */
export class Serie {
    private readonly itemSize_: number
    private readonly array_: number[]

    static create({ array, itemSize }: { array: number[], itemSize: number }): Serie {
        return new Serie({ array, itemSize })
    }

    /**
     * Build a serie from items that all have the same length.
     */
    static fromItems(items: readonly (readonly number[])[], itemSize: number): Serie {
        const array: number[] = []
        items.forEach((item, i) => {
            if (item.length !== itemSize) {
                throw new Error(`item ${i} has ${item.length} values, expected ${itemSize}`)
            }
            array.push(...item)
        })
        return new Serie({ array, itemSize })
    }

    get array(): readonly number[] {
        return this.array_
    }

    get itemSize(): number {
        return this.itemSize_
    }

    get count(): number {
        return this.array_.length / this.itemSize_
    }

    itemAt(i: number): number[] {
        if (i < 0 || i >= this.count) {
            throw new Error(`item index ${i} out of range [0, ${this.count})`)
        }
        const start = i * this.itemSize_
        return this.array_.slice(start, start + this.itemSize_)
    }

    forEach(callback: (item: number[], i: number, serie: Serie) => void): void {
        for (let i = 0; i < this.count; ++i) {
            callback(this.itemAt(i), i, this)
        }
    }

    map<T>(callback: (item: number[], i: number) => T): T[] {
        const r: T[] = []
        this.forEach((item, i) => r.push(callback(item, i)))
        return r
    }

    private constructor({ array, itemSize }: { array: number[], itemSize: number }) {
        if (!Number.isInteger(itemSize) || itemSize < 1) {
            throw new Error(`itemSize must be a positive integer, got ${itemSize}`)
        }
        if (array.length % itemSize !== 0) {
            throw new Error(`array length ${array.length} is not a multiple of itemSize ${itemSize}`)
        }
        this.array_ = array
        this.itemSize_ = itemSize
    }
}

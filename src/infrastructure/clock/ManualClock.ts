import type { BlockHeight } from '../../kernel-core/L0/Ontology.js';
import type { Clock } from '../../Platform/Ports.js';

export class ManualClock implements Clock {
    constructor(private height: BlockHeight = 0) { }

    public currentHeight(): BlockHeight {
        return this.height;
    }

    public advance(blocks: number = 1): BlockHeight {
        if (!Number.isSafeInteger(blocks) || blocks < 0) {
            throw new Error(`Clock only moves forward, got ${blocks}`);
        }
        this.height += blocks;
        return this.height;
    }

    public setHeight(height: BlockHeight): void {
        if (height < this.height) throw new Error(`Clock only moves forward: ${this.height} -> ${height}`);
        this.height = height;
    }
}

/**
 * Raw account resource counters returned by one `getaccountresource` call.
 *
 * Energy is a single allocation; Bandwidth is split between the staked
 * allocation (`net*`) and the free daily allowance (`freeNet*`).
 */
export interface IResourceReading {
    readonly energyLimit: number;
    readonly energyUsed: number;
    /** Bandwidth obtained by staking TRX */
    readonly netLimit: number;
    readonly netUsed: number;
    /** Free daily Bandwidth every activated account receives */
    readonly freeNetLimit: number;
    readonly freeNetUsed: number;
}

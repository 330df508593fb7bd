/**
 * The single asset used to pay the relay.
 */
export interface FeeTokenClient {
    readonly address: string;
    balanceOf(account: string): Promise<bigint>;
    allowance(owner: string, spender: string): Promise<bigint>;
    approve(spender: string, amount: bigint): Promise<boolean>;
}

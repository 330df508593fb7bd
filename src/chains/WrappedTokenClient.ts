/**
 * Token collaborator holding custody of the bridged NFTs on one chain.
 * Failures are collaborator-defined and propagate to the caller.
 */
export interface WrappedTokenClient {
    ownerOf(tokenId: bigint): Promise<string>;
    exists(tokenId: bigint): Promise<boolean>;
    transferFrom(from: string, to: string, tokenId: bigint): Promise<void>;
    burn(tokenId: bigint): Promise<void>;
    mintWithSpecificId(owner: string, tokenId: bigint): Promise<void>;
}

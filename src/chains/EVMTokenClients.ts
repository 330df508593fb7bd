/**
 * @packageDocumentation
 * @module EVMTokenClients
 * @description
 * ethers-backed collaborators for the wrapped NFT and the fee token.
 *
 * Writes wait for `confirmations` blocks and throw if the transaction reverted, so a
 * resolved promise always means the state change is on chain.
 */
import { ethers } from 'ethers';
import type { FeeTokenClient } from './FeeTokenClient';
import type { WrappedTokenClient } from './WrappedTokenClient';

export const WRAPPED_TOKEN_ABI = [
    'function ownerOf(uint256 tokenId) view returns (address)',
    'function transferFrom(address from, address to, uint256 tokenId)',
    'function burn(uint256 tokenId)',
    'function mintWithSpecificId(address to, uint256 tokenId)',
];

export const FEE_TOKEN_ABI = [
    'function balanceOf(address account) view returns (uint256)',
    'function allowance(address owner, address spender) view returns (uint256)',
    'function approve(address spender, uint256 amount) returns (bool)',
];

export interface EVMTokenClientConfig {
    address: string;
    runner: ethers.ContractRunner;
    confirmations?: number;
}

async function sendAndWait(
    contract: ethers.Contract,
    method: string,
    args: unknown[],
    confirmations: number
): Promise<void> {
    const tx: ethers.ContractTransactionResponse = await contract.getFunction(method).send(...args);
    const receipt = await tx.wait(confirmations);
    if (!receipt || receipt.status !== 1) {
        throw new Error(`${method} transaction ${tx.hash} failed`);
    }
}

export class EVMWrappedTokenClient implements WrappedTokenClient {
    private contract: ethers.Contract;
    private confirmations: number;

    constructor(config: EVMTokenClientConfig) {
        this.contract = new ethers.Contract(ethers.getAddress(config.address), WRAPPED_TOKEN_ABI, config.runner);
        this.confirmations = config.confirmations ?? 1;
    }

    async ownerOf(tokenId: bigint): Promise<string> {
        const owner: string = await this.contract.getFunction('ownerOf').staticCall(tokenId);
        return owner;
    }

    async exists(tokenId: bigint): Promise<boolean> {
        try {
            await this.ownerOf(tokenId);
            return true;
        } catch (error) {
            // ERC-721 ownerOf reverts for ids that were never minted or were burned
            if (ethers.isError(error, 'CALL_EXCEPTION')) return false;
            throw error;
        }
    }

    async transferFrom(from: string, to: string, tokenId: bigint): Promise<void> {
        await sendAndWait(this.contract, 'transferFrom', [from, to, tokenId], this.confirmations);
    }

    async burn(tokenId: bigint): Promise<void> {
        await sendAndWait(this.contract, 'burn', [tokenId], this.confirmations);
    }

    async mintWithSpecificId(owner: string, tokenId: bigint): Promise<void> {
        await sendAndWait(this.contract, 'mintWithSpecificId', [owner, tokenId], this.confirmations);
    }
}

export class EVMFeeTokenClient implements FeeTokenClient {
    public readonly address: string;
    private contract: ethers.Contract;
    private confirmations: number;

    constructor(config: EVMTokenClientConfig) {
        this.address = ethers.getAddress(config.address);
        this.contract = new ethers.Contract(this.address, FEE_TOKEN_ABI, config.runner);
        this.confirmations = config.confirmations ?? 1;
    }

    async balanceOf(account: string): Promise<bigint> {
        const balance: bigint = await this.contract.getFunction('balanceOf').staticCall(account);
        return balance;
    }

    async allowance(owner: string, spender: string): Promise<bigint> {
        const allowance: bigint = await this.contract.getFunction('allowance').staticCall(owner, spender);
        return allowance;
    }

    async approve(spender: string, amount: bigint): Promise<boolean> {
        const approve = this.contract.getFunction('approve');
        const accepted: boolean = await approve.staticCall(spender, amount);
        if (!accepted) return false;

        await sendAndWait(this.contract, 'approve', [spender, amount], this.confirmations);
        return true;
    }
}

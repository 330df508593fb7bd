/**
 * Chain Adapter Tests
 *
 * Tests for the HTTP relayer client (axios mocked) and the ethers-backed router and
 * token clients (contract runner and receipts stubbed in process).
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import axios from 'axios';
import { ethers } from 'ethers';
import { EVMRelayClient, MESSAGE_SENT_EVENT, ROUTER_ABI, toRouterMessage } from '../src/chains/EVMRelayClient';
import {
    EVMFeeTokenClient,
    EVMWrappedTokenClient,
    FEE_TOKEN_ABI,
    WRAPPED_TOKEN_ABI,
} from '../src/chains/EVMTokenClients';
import { HttpRelayClient, serializeMessage } from '../src/chains/HttpRelayClient';
import { MessageBuilder } from '../src/routing/MessageBuilder';
import type { OutboundMessage } from '../src/types/bridge';
import { BridgeErrorCode } from '../src/types/errors';
import { ALICE, BOB, BRIDGE_X, BRIDGE_Y, FEE_TOKEN_X, ROUTER_X, SELECTOR_Y } from './helpers/chain';
import { StubRunner, revert } from './helpers/evm';

const http = vi.hoisted(() => ({
    get: vi.fn(),
    post: vi.fn(),
}));

vi.mock('axios', () => ({
    default: {
        create: vi.fn(() => http),
    },
}));

const coder = ethers.AbiCoder.defaultAbiCoder();

const MESSAGE: OutboundMessage = {
    destinationSelector: SELECTOR_Y,
    receiver: BRIDGE_Y,
    payload: '0x' + '0'.repeat(63) + '7' + '0'.repeat(24) + '2'.repeat(40),
    feeToken: FEE_TOKEN_X,
    gasLimit: BigInt(200000),
    extraArgs: '0x97a657c9' + '0'.repeat(59) + '30d40',
};

describe('HttpRelayClient', () => {
    let client: HttpRelayClient;

    beforeEach(() => {
        http.get.mockReset();
        http.post.mockReset();
        client = new HttpRelayClient({
            baseUrl: 'https://relayer.test',
            routerAddress: ROUTER_X,
            apiKey: 'test-key',
        });
    });

    it('should configure the HTTP client', () => {
        expect(axios.create).toHaveBeenCalledWith({
            baseURL: 'https://relayer.test',
            timeout: 10000,
            headers: { 'x-api-key': 'test-key' },
        });
        expect(client.routerAddress).toBe(ROUTER_X);
    });

    it('should query chain support by selector', async () => {
        http.get.mockResolvedValue({ data: { supported: true } });

        const supported = await client.isChainSupported(SELECTOR_Y);

        expect(supported).toBe(true);
        expect(http.get).toHaveBeenCalledWith('/chains/14767482510784806043');
    });

    it('should request a fee with the serialized message', async () => {
        http.post.mockResolvedValue({ data: { fee: '12345' } });

        const fee = await client.getFee(SELECTOR_Y, MESSAGE);

        expect(fee).toBe(BigInt(12345));
        expect(http.post).toHaveBeenCalledWith('/fee', {
            destinationSelector: '14767482510784806043',
            message: serializeMessage(MESSAGE),
        });
    });

    it('should serialize bigints as decimal strings', () => {
        expect(serializeMessage(MESSAGE)).toEqual({
            destinationSelector: '14767482510784806043',
            receiver: BRIDGE_Y,
            payload: MESSAGE.payload,
            feeToken: FEE_TOKEN_X,
            gasLimit: '200000',
            extraArgs: MESSAGE.extraArgs,
        });
    });

    it('should reject a malformed fee', async () => {
        http.post.mockResolvedValue({ data: { fee: '-5' } });

        await expect(client.getFee(SELECTOR_Y, MESSAGE)).rejects.toThrow('Relayer returned a malformed fee: -5');
    });

    it('should return the message id from a send', async () => {
        const messageId = '0x' + '12'.repeat(32);
        http.post.mockResolvedValue({ data: { messageId } });

        await expect(client.send(SELECTOR_Y, MESSAGE)).resolves.toBe(messageId);
        expect(http.post).toHaveBeenCalledWith('/messages', expect.objectContaining({
            destinationSelector: '14767482510784806043',
        }));
    });

    it('should surface relayer outages as RELAY_UNAVAILABLE through the builder', async () => {
        http.get.mockRejectedValue(new Error('timeout of 10000ms exceeded'));
        const builder = new MessageBuilder(client);

        const quote = await builder.quote(MESSAGE);

        expect(quote.ok).toBe(false);
        if (quote.ok) return;
        expect(quote.error.code).toBe(BridgeErrorCode.RELAY_UNAVAILABLE);
        expect(quote.error.message).toBe('Relay unavailable: isChainSupported failed: timeout of 10000ms exceeded');
    });
});

describe('EVMRelayClient', () => {
    const routerInterface = new ethers.Interface([...ROUTER_ABI, MESSAGE_SENT_EVENT]);
    const MESSAGE_ID = '0x' + 'ab'.repeat(32);

    function messageSentLog(messageId: string) {
        const { topics, data } = routerInterface.encodeEventLog('MessageSent', [
            messageId,
            SELECTOR_Y,
            BRIDGE_Y,
            FEE_TOKEN_X,
            BigInt(1000),
        ]);
        return { address: ROUTER_X, topics, data };
    }

    it('should encode the receiver as ABI bytes in the router message', () => {
        const routerMessage = toRouterMessage(MESSAGE);

        expect(routerMessage.receiver).toBe('0x' + '0'.repeat(24) + '5'.repeat(40));
        expect(routerMessage.tokenAmounts).toEqual([]);
        expect(routerMessage.data).toBe(MESSAGE.payload);
    });

    it('should read chain support from the router', async () => {
        const runner = new StubRunner(() => coder.encode(['bool'], [true]));
        const client = new EVMRelayClient({ routerAddress: ROUTER_X, runner });

        await expect(client.isChainSupported(SELECTOR_Y)).resolves.toBe(true);
    });

    it('should call getFee with the router message', async () => {
        const runner = new StubRunner(() => coder.encode(['uint256'], [BigInt(777)]));
        const client = new EVMRelayClient({ routerAddress: ROUTER_X, runner });

        const fee = await client.getFee(SELECTOR_Y, MESSAGE);

        expect(fee).toBe(BigInt(777));
        const args = routerInterface.decodeFunctionData('getFee', runner.calls[0]);
        expect(args[0]).toBe(SELECTOR_Y);
        expect(args[1].feeToken).toBe(FEE_TOKEN_X);
        expect(args[1].extraArgs).toBe(MESSAGE.extraArgs);
    });

    it('should take the message id from the mined MessageSent log', async () => {
        const runner = new StubRunner();
        runner.logs = [
            {
                address: FEE_TOKEN_X,
                topics: [ethers.id('Transfer(address,address,uint256)'), ethers.ZeroHash, ethers.ZeroHash],
                data: coder.encode(['uint256'], [BigInt(1000)]),
            },
            messageSentLog(MESSAGE_ID),
        ];
        const client = new EVMRelayClient({ routerAddress: ROUTER_X, runner });

        const messageId = await client.send(SELECTOR_Y, MESSAGE);

        expect(messageId).toBe(MESSAGE_ID);
        expect(runner.calls).toEqual([]);
        const args = routerInterface.decodeFunctionData('ccipSend', runner.sent[0]);
        expect(args[0]).toBe(SELECTOR_Y);
        expect(args[1].data).toBe(MESSAGE.payload);
    });

    it('should fail when the mined transaction carries no MessageSent log', async () => {
        const runner = new StubRunner();
        const client = new EVMRelayClient({ routerAddress: ROUTER_X, runner });

        await expect(client.send(SELECTOR_Y, MESSAGE)).rejects.toThrow('emitted no MessageSent event');
    });

    it('should fail when ccipSend reverts', async () => {
        const runner = new StubRunner();
        runner.status = 0;
        runner.logs = [messageSentLog(MESSAGE_ID)];
        const client = new EVMRelayClient({ routerAddress: ROUTER_X, runner });

        await expect(client.send(SELECTOR_Y, MESSAGE)).rejects.toThrow();
    });
});

describe('EVMWrappedTokenClient', () => {
    const tokenInterface = new ethers.Interface(WRAPPED_TOKEN_ABI);

    it('should read the owner of a token', async () => {
        const runner = new StubRunner(() => coder.encode(['address'], [BOB]));
        const client = new EVMWrappedTokenClient({ address: BRIDGE_X, runner });

        await expect(client.ownerOf(BigInt(7))).resolves.toBe(BOB);
        await expect(client.exists(BigInt(7))).resolves.toBe(true);
    });

    it('should report a reverting ownerOf as a missing token', async () => {
        const runner = new StubRunner(() => revert());
        const client = new EVMWrappedTokenClient({ address: BRIDGE_X, runner });

        await expect(client.exists(BigInt(7))).resolves.toBe(false);
    });

    it('should rethrow ownerOf failures other than a revert', async () => {
        const runner = new StubRunner(() => {
            throw new Error('connection refused');
        });
        const client = new EVMWrappedTokenClient({ address: BRIDGE_X, runner });

        await expect(client.exists(BigInt(7))).rejects.toThrow('connection refused');
    });

    it('should send transferFrom, burn and mintWithSpecificId', async () => {
        const runner = new StubRunner();
        const client = new EVMWrappedTokenClient({ address: BRIDGE_X, runner });

        await client.transferFrom(ALICE, BRIDGE_X, BigInt(7));
        await client.burn(BigInt(7));
        await client.mintWithSpecificId(BOB, BigInt(8));

        expect(runner.sent).toHaveLength(3);
        expect([...tokenInterface.decodeFunctionData('transferFrom', runner.sent[0])])
            .toEqual([ALICE, BRIDGE_X, BigInt(7)]);
        expect([...tokenInterface.decodeFunctionData('burn', runner.sent[1])]).toEqual([BigInt(7)]);
        expect([...tokenInterface.decodeFunctionData('mintWithSpecificId', runner.sent[2])])
            .toEqual([BOB, BigInt(8)]);
    });

    it('should fail a write whose transaction reverted', async () => {
        const runner = new StubRunner();
        runner.status = 0;
        const client = new EVMWrappedTokenClient({ address: BRIDGE_X, runner });

        await expect(client.burn(BigInt(7))).rejects.toThrow();
    });
});

describe('EVMFeeTokenClient', () => {
    const feeInterface = new ethers.Interface(FEE_TOKEN_ABI);
    const balanceOfSelector = ethers.id('balanceOf(address)').slice(0, 10);

    it('should read balances and allowances', async () => {
        const runner = new StubRunner((data) =>
            data.startsWith(balanceOfSelector)
                ? coder.encode(['uint256'], [BigInt(5000)])
                : coder.encode(['uint256'], [BigInt(250)])
        );
        const client = new EVMFeeTokenClient({ address: FEE_TOKEN_X, runner });

        expect(client.address).toBe(FEE_TOKEN_X);
        await expect(client.balanceOf(BRIDGE_X)).resolves.toBe(BigInt(5000));
        await expect(client.allowance(BRIDGE_X, ROUTER_X)).resolves.toBe(BigInt(250));
        expect(runner.calls).toHaveLength(2);
    });

    it('should send approve once the token accepts it', async () => {
        const runner = new StubRunner(() => coder.encode(['bool'], [true]));
        const client = new EVMFeeTokenClient({ address: FEE_TOKEN_X, runner });

        await expect(client.approve(ROUTER_X, BigInt(500))).resolves.toBe(true);

        expect(runner.sent).toHaveLength(1);
        expect([...feeInterface.decodeFunctionData('approve', runner.sent[0])]).toEqual([ROUTER_X, BigInt(500)]);
    });

    it('should not send approve when the token would return false', async () => {
        const runner = new StubRunner(() => coder.encode(['bool'], [false]));
        const client = new EVMFeeTokenClient({ address: FEE_TOKEN_X, runner });

        await expect(client.approve(ROUTER_X, BigInt(500))).resolves.toBe(false);

        expect(runner.calls).toHaveLength(1);
        expect(runner.sent).toEqual([]);
    });
});

/**
 * Transfer Log Decoder
 *
 * Turns a raw ERC-721 Transfer log into a TransferFact.
 *
 * The tracked event declares all three parameters indexed, so they are recovered
 * from topics[1..3] only:
 * - topics[0]: event selector
 * - topics[1]: from (address)
 * - topics[2]: to (address)
 * - topics[3]: tokenId (uint256)
 *
 * The event descriptor is checked and its selector computed once, in the
 * constructor. decode() is pure and safe to call for every log.
 */

import { decodeEventLog, getAddress, toEventSelector, type Hex } from 'viem';
import {
  DecodeError,
  ERC721_TRANSFER_EVENT,
  errorMessage,
  type Erc721TransferEvent,
  type RawLog,
  type TransferFact,
} from '@nftrack/shared';

/** selector + from + to + tokenId */
const TRANSFER_TOPIC_COUNT = 4;

export class TransferLogDecoder {
  /** keccak256("Transfer(address,address,uint256)") */
  readonly topic0: Hex;

  private readonly abi: readonly [Erc721TransferEvent];

  constructor(event: Erc721TransferEvent = ERC721_TRANSFER_EVENT) {
    const unindexed = event.inputs.filter((input) => !input.indexed);
    if (event.inputs.length !== TRANSFER_TOPIC_COUNT - 1 || unindexed.length > 0) {
      throw new Error(`Event ${event.name} must declare exactly three indexed inputs`);
    }

    this.abi = [event];
    this.topic0 = toEventSelector(event);
  }

  /**
   * Decode one log.
   *
   * @throws DecodeError if the log has the wrong topic count, a foreign selector,
   *   or topics that are not valid ABI words
   */
  decode(log: RawLog): TransferFact {
    const [signature, ...args] = log.topics;

    if (log.topics.length !== TRANSFER_TOPIC_COUNT || signature === undefined) {
      throw new DecodeError(
        `Expected ${TRANSFER_TOPIC_COUNT} topics, got ${log.topics.length}`,
        log.transactionHash,
        log.logIndex
      );
    }

    if (signature.toLowerCase() !== this.topic0) {
      throw new DecodeError(
        `Unexpected event selector ${signature}`,
        log.transactionHash,
        log.logIndex
      );
    }

    try {
      const decoded = decodeEventLog({
        abi: this.abi,
        topics: [this.topic0, ...args],
        data: log.data,
        strict: true,
      });

      return {
        tokenId: decoded.args.tokenId,
        from: decoded.args.from,
        to: decoded.args.to,
        contractAddress: getAddress(log.address),
        txHash: log.transactionHash,
        blockNumber: log.blockNumber,
        logIndex: log.logIndex,
      };
    } catch (error) {
      throw new DecodeError(
        `Malformed Transfer log: ${errorMessage(error)}`,
        log.transactionHash,
        log.logIndex,
        { cause: error }
      );
    }
  }
}

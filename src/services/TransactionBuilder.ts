import {Transaction, Wallet, keccak256} from "ethers";
import {MARKET_INTERFACE, TOKEN_INTERFACE} from "../infrastructure/abis";
import {SignedPayload, TransactionIntent, TxFees} from "../types/chain.types";

export interface TransactionBuilderConfig {
  chainId: number;
  token: string;
  approveGasLimit: bigint;
  buyGasLimit: bigint;
}

/**
 * Builds approve/buy intents and signs them. Network-free: nonce and gas
 * price come in through `fees`, the key through `sign`.
 */
export class TransactionBuilder {
  constructor(private readonly config: TransactionBuilderConfig) {}

  buildApprove(spender: string, amount: bigint, fees: TxFees): TransactionIntent {
    return {
      to: this.config.token,
      data: TOKEN_INTERFACE.encodeFunctionData("approve", [spender, amount]),
      value: 0n,
      nonce: fees.nonce,
      gasLimit: this.config.approveGasLimit,
      gasPrice: fees.gasPrice,
      chainId: this.config.chainId
    };
  }

  buildBuy(market: string, investment: bigint, outcomeIndex: number, minTokens: bigint, fees: TxFees): TransactionIntent {
    return {
      to: market,
      data: MARKET_INTERFACE.encodeFunctionData("buy", [investment, outcomeIndex, minTokens]),
      value: 0n,
      nonce: fees.nonce,
      gasLimit: this.config.buyGasLimit,
      gasPrice: fees.gasPrice,
      chainId: this.config.chainId
    };
  }

  sign(intent: TransactionIntent, wallet: Wallet): SignedPayload {
    const unsigned = Transaction.from({
      type: 0,
      to: intent.to,
      data: intent.data,
      value: intent.value,
      nonce: intent.nonce,
      gasLimit: intent.gasLimit,
      gasPrice: intent.gasPrice,
      chainId: intent.chainId
    });
    unsigned.signature = wallet.signingKey.sign(unsigned.unsignedHash);
    const raw = unsigned.serialized;

    return {raw, txHash: keccak256(raw), nonce: intent.nonce};
  }
}

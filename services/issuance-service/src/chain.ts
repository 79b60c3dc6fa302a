import { Contract, JsonRpcProvider, Wallet, getAddress } from "ethers";
import type { Identity } from "@holderpass/shared";
import type { BalanceOracle, TokenIssuer } from "./core/collaborators.js";

const ERC20_ABI = [
  "function balanceOf(address account) view returns (uint256)",
] as const;

const CREDENTIAL_TOKEN_ABI = [
  "function mint(address to, uint256 id, uint256 amount, bytes data)",
  "function balanceOf(address account, uint256 id) view returns (uint256)",
] as const;

const DEFAULT_CHAIN_RPC_URL = "http://127.0.0.1:8545";

function expectUint(value: unknown, label: string): bigint {
  if (typeof value !== "bigint") {
    throw new Error(`${label} returned a non-integer value`);
  }
  return value;
}

/** Reads ERC-20 balances of whichever asset is configured at call time. */
export class Erc20BalanceOracle implements BalanceOracle {
  constructor(private readonly provider: JsonRpcProvider) {}

  async balanceOf(asset: Identity, holder: Identity): Promise<bigint> {
    const token = new Contract(asset, ERC20_ABI, this.provider);
    const raw: unknown = await token.getFunction("balanceOf").staticCall(holder);
    return expectUint(raw, `balanceOf(${holder}) on ${asset}`);
  }
}

/**
 * Mints through an ERC-1155 credential contract on which the signer holds
 * admin rights. `issue` resolves once the transaction is mined.
 */
export class Erc1155TokenIssuer implements TokenIssuer {
  private readonly contract: Contract;

  constructor(provider: JsonRpcProvider, privateKey: string, tokenAddress: string) {
    const wallet = new Wallet(privateKey, provider);
    this.contract = new Contract(getAddress(tokenAddress), CREDENTIAL_TOKEN_ABI, wallet);
  }

  async issue(to: Identity, tokenId: bigint, quantity: bigint, data: string): Promise<void> {
    const tx = await this.contract.getFunction("mint").send(to, tokenId, quantity, data);
    const receipt = await tx.wait();
    if (!receipt || receipt.status !== 1) {
      throw new Error(`mint transaction ${tx.hash} did not succeed`);
    }
  }

  async balanceOfToken(holder: Identity, tokenId: bigint): Promise<bigint> {
    const raw: unknown = await this.contract.getFunction("balanceOf").staticCall(holder, tokenId);
    return expectUint(raw, `balanceOf(${holder}, ${tokenId})`);
  }
}

export interface ChainCollaborators {
  oracle: BalanceOracle | null;
  issuer: TokenIssuer | null;
}

/**
 * The oracle is enabled by CHAIN_RPC_URL; the on-chain issuer additionally
 * needs CREDENTIAL_TOKEN_ADDRESS and CHAIN_PRIVATE_KEY.
 */
export function buildChainCollaboratorsFromEnv(): ChainCollaborators {
  const rpcUrl = process.env.CHAIN_RPC_URL;
  const tokenAddress = process.env.CREDENTIAL_TOKEN_ADDRESS;
  if (!rpcUrl && !tokenAddress) {
    return { oracle: null, issuer: null };
  }

  const provider = new JsonRpcProvider(rpcUrl || DEFAULT_CHAIN_RPC_URL);
  const oracle = new Erc20BalanceOracle(provider);
  if (!tokenAddress) {
    return { oracle, issuer: null };
  }

  const privateKey = process.env.CHAIN_PRIVATE_KEY;
  if (!privateKey) {
    throw new Error("CHAIN_PRIVATE_KEY is required when CREDENTIAL_TOKEN_ADDRESS is set");
  }
  return { oracle, issuer: new Erc1155TokenIssuer(provider, privateKey, tokenAddress) };
}

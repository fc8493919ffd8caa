/**
 * Network module exports
 */

export * from "./rpc-utils";
export * from "./provider";
export * from "./helius";
export * from "./token-accounts";

import { HolderSourceKind } from "../types";
import { AccountDataProvider } from "./provider";
import { HeliusDasProvider } from "./helius";
import {
  LargestAccountsProvider,
  ProgramAccountsProvider,
  ReaderFactory,
  TokenProgramKind,
  createConnectionFactory,
} from "./token-accounts";

/**
 * Provider for the configured holder source
 */
export function createAccountDataProvider(
  kind: HolderSourceKind,
  options: { tokenProgram?: TokenProgramKind; readerFor?: ReaderFactory } = {}
): AccountDataProvider {
  switch (kind) {
    case "das":
      return new HeliusDasProvider();
    case "largest-accounts":
      return new LargestAccountsProvider({ readerFor: options.readerFor ?? createConnectionFactory() });
    case "program-accounts":
      return new ProgramAccountsProvider({
        readerFor: options.readerFor ?? createConnectionFactory(),
        tokenProgram: options.tokenProgram,
      });
  }
}

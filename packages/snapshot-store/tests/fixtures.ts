import type { LedgerState } from "@strongbox/types";

export const TS = "2024-01-15T10:00:00.000Z";

export const SAMPLE_STATE: LedgerState = {
  accounts: {
    "ACC-000001": {
      accountId: "ACC-000001",
      owner: "Alice",
      balance: 1150,
      isActive: true,
      transactions: [
        {
          id: "ACC-000001-TXN-0001",
          kind: "DEPOSIT",
          amount: 1000,
          balanceAfter: 1000,
          timestamp: TS,
          description: "Initial deposit",
        },
        {
          id: "ACC-000001-TXN-0002",
          kind: "DEPOSIT",
          amount: 150,
          balanceAfter: 1150,
          timestamp: TS,
          description: null,
        },
      ],
      createdAt: TS,
      transactionCounter: 2,
    },
    "ACC-000002": {
      accountId: "ACC-000002",
      owner: "Bob",
      balance: 0,
      isActive: false,
      transactions: [],
      createdAt: TS,
      transactionCounter: 0,
    },
  },
  accountCounter: 2,
};

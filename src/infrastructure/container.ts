import { InMemoryBank } from "./adapters/InMemoryBank";
import { InMemoryTransferJournal } from "./adapters/InMemoryTransferJournal";
import { MakeTransferUseCase } from "../core/use-cases/MakeTransferUseCase";
import { loadConfig } from "./config";

const config = loadConfig();

// Shared by every handler in this process; state lasts as long as the runtime.
export const bank = new InMemoryBank(config.openingBalances);
const journal = new InMemoryTransferJournal();
export const makeTransfer = new MakeTransferUseCase(bank, journal);

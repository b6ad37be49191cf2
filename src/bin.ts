import { hideBin } from "yargs/helpers";
import { main } from "./cli";

process.exitCode = await main(hideBin(process.argv));

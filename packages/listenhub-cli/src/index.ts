import cac from "cac";
import { version } from "../package.json";
import { demo } from "./commands/demo";

const cli = cac("listenhub");

cli.command("demo", "Register receivers on a sender and deliver a message to them")
    .option("-e, --event <name>", "Event to register on and send", { default: "event1" })
    .option("-p, --payload <json>", "Payload, parsed as JSON when possible")
    .option("-r, --receivers <count>", "Number of receivers", { default: 1 })
    .option("-w, --whisper <name>", "Also whisper the payload to one receiver (e.g. receiver1)")
    .option("--mute <name>", "Mute one receiver before sending")
    .option("-l, --logLevel <level>", "Log level (debug | warn | error | silent)", { default: "warn" })
    .action(demo);

cli.help();
cli.version(version);
cli.parse();

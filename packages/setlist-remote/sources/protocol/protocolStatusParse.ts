import { getLogger } from "../log.js";
import { ACTIVE_INDEX_KEY, PROTOCOL_NAMESPACE, TABS_KEY } from "./protocolCommands.js";
import { protocolFieldsSplit } from "./protocolFieldsSplit.js";
import { protocolKeyedFieldParse } from "./protocolKeyedFieldParse.js";
import { protocolRecordsSplit } from "./protocolRecordsSplit.js";
import { protocolTabListParse } from "./protocolTabListParse.js";
import { protocolTransportParse } from "./protocolTransportParse.js";
import {
    type DaemonState,
    daemonStateEmpty,
    type TransportState,
    transportStateEmpty
} from "./protocolTypes.js";

const logger = getLogger("protocol.status");

export type ProtocolStatus = {
    daemon: DaemonState;
    transport: TransportState;
};

/**
 * Parses the body of a status batch (see protocolStatusCommands).
 * Records: 0 = tabs, 1 = active index, 2 = transport.
 */
export function protocolStatusParse(body: string): ProtocolStatus {
    const records = protocolRecordsSplit(body);
    if (records.length < 3) {
        logger.warn({ records: records.length }, "error: Status response too short, expected 3 records");
        return { daemon: daemonStateEmpty(), transport: transportStateEmpty() };
    }

    const transport = protocolTransportParse(protocolFieldsSplit(records[2]));

    const tabsValue = protocolKeyedFieldParse(protocolFieldsSplit(records[0]), PROTOCOL_NAMESPACE, TABS_KEY);
    if (tabsValue === null) {
        logger.warn("error: Status response has no tab list record");
        return { daemon: daemonStateEmpty(), transport };
    }

    const indexValue = protocolKeyedFieldParse(protocolFieldsSplit(records[1]), PROTOCOL_NAMESPACE, ACTIVE_INDEX_KEY);
    const activeIndex = indexValue !== null && /^\d+$/.test(indexValue.trim()) ? Number.parseInt(indexValue, 10) : null;
    if (activeIndex === null) {
        logger.warn({ value: indexValue }, "error: Active index missing or not a number");
    }

    return {
        daemon: {
            tabs: protocolTabListParse(tabsValue),
            activeIndex: activeIndex ?? 0,
            success: true
        },
        transport
    };
}

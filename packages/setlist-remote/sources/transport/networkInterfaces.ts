import os from "node:os";

import { getLogger } from "../log.js";
import type { NetworkPort, NetworkStatus } from "./transportTypes.js";

const logger = getLogger("transport.network");

type InterfaceMap = ReturnType<typeof os.networkInterfaces>;

export type NetworkInterfacesOptions = {
    allowLoopback?: boolean;
};

/**
 * NetworkPort backed by the host's interfaces: connected once any
 * non-internal IPv4 address is up. With allowLoopback a loopback address
 * counts too, for a DAW on the same machine.
 */
export function networkInterfacesCreate(
    read: () => InterfaceMap = os.networkInterfaces,
    options: NetworkInterfacesOptions = {}
): NetworkPort {
    return {
        connect: async (): Promise<NetworkStatus> => {
            const address = networkAddressFind(read(), options.allowLoopback ?? false);
            if (!address) {
                logger.debug("connect: No external IPv4 interface is up");
                return { connected: false, address: null };
            }
            return { connected: true, address };
        }
    };
}

export function networkAddressFind(interfaces: InterfaceMap, allowLoopback = false): string | null {
    const entries = Object.values(interfaces).flatMap((list) => list ?? []);
    const ipv4 = entries.filter((entry) => entry.family === "IPv4");
    const external = ipv4.find((entry) => !entry.internal);
    if (external) {
        return external.address;
    }
    return allowLoopback ? (ipv4[0]?.address ?? null) : null;
}

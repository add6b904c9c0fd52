import { TRANSPORT_TAG } from "./protocolCommands.js";
import { type TransportState, transportStateEmpty } from "./protocolTypes.js";

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Decodes `TRANSPORT\tplay_state\tposition\trepeat\tbars_beats`.
 * Never throws: any shape or number problem yields success=false with defaults.
 */
export function protocolTransportParse(fields: readonly string[]): TransportState {
    if (fields.length < 5 || fields[0] !== TRANSPORT_TAG) {
        return transportStateEmpty();
    }

    const [, playStateText, positionText, repeatText, barsBeats] = fields;
    if (!INTEGER_PATTERN.test(playStateText.trim())) {
        return transportStateEmpty();
    }
    const playState = Number.parseInt(playStateText, 10);

    const positionTrimmed = positionText.trim();
    const positionSeconds = positionTrimmed.length > 0 ? Number(positionTrimmed) : Number.NaN;
    if (!Number.isFinite(positionSeconds) || positionSeconds < 0) {
        return transportStateEmpty();
    }

    return {
        playState,
        positionSeconds,
        repeatEnabled: repeatText === "1",
        positionBarsBeats: barsBeats,
        success: true
    };
}

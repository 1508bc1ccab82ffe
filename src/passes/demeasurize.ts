// ─── DeMeasurizer ────────────────────────────────────────────────────────────
//
// MChirp → Chirp. Measures already hold absolute ticks, so flattening is a
// walk in measure order that drops rests and rejoins tied segments.
// Time signatures have no place in a Chirp and are dropped.
// ─────────────────────────────────────────────────────────────────────────────

import { Chirp } from "../chirp/chirp.js";
import { joinTiedNotes, type MChirp } from "../chirp/mchirp.js";

/**
 * Flatten an MChirp back to a tick timeline.
 *
 * The result declares the MChirp's grid; it is quantized and free of
 * same-channel overlaps.
 *
 * @throws ChirpError MalformedRepresentation on a broken tie chain.
 */
export function demeasurize(song: MChirp): Chirp {
  return new Chirp({
    ticksPerQuarter: song.ticksPerQuarter,
    tempos: song.tempos,
    metadata: song.metadata,
    grid: song.grid,
    channels: song.channels.map(channel => ({
      id: channel.id,
      name: channel.name,
      instrument: channel.instrument,
      notes: joinTiedNotes(channel),
    })),
  });
}

// Primitive musical types (MidiNote, PitchClass)
export * from "./primitives/primitives";

export * from "./pitch/pitch";

// Four-part voicings and voice ranges
export * from "./voicing/voicing";

// Engine input (ChordSpec, Progression)
export * from "./progression/progression";

export * from "./realization/interfaces";

export * from "./diagnostics/diagnostics";

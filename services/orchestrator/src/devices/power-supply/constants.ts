// services/orchestrator/src/devices/power-supply/constants.ts

/**
 * DPS-150 wire constants. Field identifiers are part of the device's wire
 * contract and must never be renumbered.
 */

// Frame headers
export const HEADER_INPUT = 0xf0               // device → host
export const HEADER_OUTPUT = 0xf1              // host → device

// Command bytes
export const CMD_GET = 0xa1
export const CMD_BAUD = 0xb0                   // baud-rate select
export const CMD_SET = 0xb1
export const CMD_SESSION = 0xc1                // streaming start/stop toggle

// Frame geometry
export const FRAME_OVERHEAD = 5                // header + command + fieldId + length + checksum
export const FRAME_PREFIX = 4                  // bytes before the payload
export const MAX_PAYLOAD = 0xff

// Field byte carried by session and baud commands
export const CONTROL_FIELD = 0

// Measurements
export const INPUT_VOLTAGE = 192
export const OUTPUT_VIP = 195                  // voltage, current, power
export const TEMPERATURE = 196

// Setpoints
export const VOLTAGE_SET = 193
export const CURRENT_SET = 194

export const GROUP1_VOLTAGE_SET = 197
export const GROUP1_CURRENT_SET = 198
export const GROUP2_VOLTAGE_SET = 199
export const GROUP2_CURRENT_SET = 200
export const GROUP3_VOLTAGE_SET = 201
export const GROUP3_CURRENT_SET = 202
export const GROUP4_VOLTAGE_SET = 203
export const GROUP4_CURRENT_SET = 204
export const GROUP5_VOLTAGE_SET = 205
export const GROUP5_CURRENT_SET = 206
export const GROUP6_VOLTAGE_SET = 207
export const GROUP6_CURRENT_SET = 208

// Protection thresholds
export const OVP = 209
export const OCP = 210
export const OPP = 211
export const OTP = 212
export const LVP = 213

// Display
export const BRIGHTNESS = 214
export const VOLUME = 215

// Switches + counters
export const METERING_ENABLE = 216
export const OUTPUT_CAPACITY = 217
export const OUTPUT_ENERGY = 218
export const OUTPUT_ENABLE = 219
export const PROTECTION_STATE = 220
export const MODE = 221

// Identity
export const MODEL_NAME = 222
export const HARDWARE_VERSION = 223
export const FIRMWARE_VERSION = 224

// Limits
export const UPPER_LIMIT_VOLTAGE = 226
export const UPPER_LIMIT_CURRENT = 227

// Bulk
export const ALL = 255
export const ALL_PAYLOAD_LENGTH = 119

/** Supported line rates; the device expects the 1-based index of the rate. */
export const BAUD_RATES = [9600, 19200, 38400, 57600, 115200] as const

/** Indexed by the device's protection-state byte. */
export const PROTECTION_STATES = ['none', 'OVP', 'OCP', 'OPP', 'OTP', 'LVP', 'REP'] as const

/** Indexed by the device's regulation-mode byte. */
export const MODES = ['CC', 'CV'] as const

// USB identity of the supply's AT32 CDC controller
export const USB_VENDOR_ID = '2e3c'
export const USB_PRODUCT_ID = '5740'

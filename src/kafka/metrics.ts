import { Counter, Gauge } from 'prom-client'

export const consumerRecordsForwarded = new Counter({
    name: 'consumer_bridge_records_forwarded_total',
    help: 'Records handed from the native record queue to the output channel',
})

export const consumerPollDriveErrors = new Counter({
    name: 'consumer_bridge_poll_drive_errors_total',
    help: 'Failed housekeeping polls of the native consumer',
})

export const consumerUnexpectedEvents = new Counter({
    name: 'consumer_bridge_unexpected_events_total',
    help: 'Non-record events found on the native record queue',
    labelNames: ['kind'],
})

export const consumerOffsetsStored = new Counter({
    name: 'consumer_bridge_offsets_stored_total',
    help: 'Offsets marked as processed through storeOffset',
    labelNames: ['topic'],
})

export const consumerOutputChannelSize = new Gauge({
    name: 'consumer_bridge_output_channel_size',
    help: 'Messages waiting in the output channel after the last send',
})

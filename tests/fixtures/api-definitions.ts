/**
 * @file api-definitions.ts
 * @module tests/fixtures/api-definitions
 * @license MIT
 *
 * @fileoverview In-memory API definitions shared by model and generator tests.
 */

import type { ApiDefinitions } from '../../src/model/types.js';
import { docOf, textDoc, TEST_GIT_INFO } from '../setup.js';

/**
 * A small API: two enums, two structs and one class.
 */
export function createTestDefinitions(): ApiDefinitions {
  return {
    gitInfo: TEST_GIT_INFO,
    enums: [
      {
        name: 'roc_interface',
        doc: docOf(
          [{ type: 'text', text: 'Network interface.' }],
          [{ type: 'text', text: 'Interface is a way to access the peer via network.' }],
        ),
        values: [
          {
            name: 'ROC_INTERFACE_AUDIO_SOURCE',
            value: '11',
            doc: docOf(
              [{ type: 'text', text: 'Interface for audio stream source data.' }],
              [
                { type: 'text', text: 'Applicable to' },
                { type: 'ref', text: 'roc_sender' },
                { type: 'text', text: 'and' },
                { type: 'ref', text: 'roc_receiver' },
                { type: 'text', text: '.' },
              ],
            ),
          },
          {
            name: 'ROC_INTERFACE_AUDIO_REPAIR',
            value: '12',
            doc: textDoc('Interface for audio stream repair data.'),
          },
        ],
      },
      {
        name: 'roc_protocol',
        doc: textDoc('Network protocol.'),
        values: [
          {
            name: 'ROC_PROTO_RTP',
            value: '10',
            doc: docOf(
              [{ type: 'text', text: 'Bare RTP.' }],
              [
                { type: 'text', text: 'Can be used with' },
                { type: 'ref', text: 'ROC_INTERFACE_AUDIO_SOURCE' },
                { type: 'text', text: '.' },
              ],
            ),
          },
          {
            name: 'ROC_PROTO_RTCP',
            value: '70',
            doc: docOf([
              { type: 'text', text: 'RTCP control' },
              { type: 'bold', text: 'protocol' },
              { type: 'text', text: '.' },
            ]),
          },
        ],
      },
    ],
    structs: [
      {
        name: 'roc_interface_config',
        doc: docOf(
          [{ type: 'text', text: 'Interface configuration.' }],
          [
            { type: 'text', text: 'Used with' },
            { type: 'ref', text: 'roc_sender_config' },
            { type: 'text', text: '.' },
          ],
        ),
        fields: [
          {
            name: 'outgoing_address',
            type: 'char',
            doc: docOf(
              [{ type: 'text', text: 'Interface outgoing address.' }],
              [{ type: 'text', text: 'May be left empty.' }],
            ),
          },
          {
            name: 'reuse_address',
            type: 'int',
            doc: textDoc('Allow multiple sockets to use the same address.'),
          },
        ],
      },
      {
        name: 'roc_sender_config',
        doc: textDoc('Sender configuration.'),
        fields: [
          {
            name: 'packet_length',
            type: 'unsigned long long',
            doc: textDoc('Length of the packets produced by sender, in nanoseconds.'),
          },
          {
            name: 'fec_encoding',
            type: 'roc_fec_encoding',
            doc: docOf(
              [{ type: 'text', text: 'Encoding for FEC packets.' }],
              [
                { type: 'text', text: 'Two cases:' },
                {
                  type: 'list',
                  blocks: [
                    {
                      items: [
                        { type: 'text', text: 'if' },
                        { type: 'ref', text: 'packet_length' },
                        { type: 'text', text: 'is zero, the default length is used' },
                      ],
                    },
                    {
                      items: [
                        { type: 'text', text: 'if' },
                        { type: 'code', text: 'fec_encoding' },
                        { type: 'text', text: 'is disabled, no repair packets are sent' },
                      ],
                    },
                  ],
                },
              ],
            ),
          },
          {
            name: 'frame_channels',
            type: 'unsigned int',
            doc: docOf([
              { type: 'text', text: 'Number of channels, see' },
              { type: 'code', text: 'ROC_CHANNEL_LAYOUT_MULTITRACK' },
              { type: 'text', text: '.' },
            ]),
          },
        ],
      },
    ],
    classes: [
      {
        name: 'roc_sender',
        doc: docOf(
          [{ type: 'text', text: 'Sender peer.' }],
          [{ type: 'text', text: 'Sender encodes an audio stream and sends it to a receiver.' }],
          [
            { type: 'see' },
            { type: 'ref', text: 'roc_sender_open()' },
            { type: 'text', text: ',' },
            { type: 'ref', text: 'roc_sender_write()' },
          ],
        ),
        methods: [
          { name: 'roc_sender_open', doc: textDoc('Open a new sender.') },
          {
            name: 'roc_sender_write',
            doc: docOf(
              [{ type: 'text', text: 'Encode and transmit a frame.' }],
              [
                { type: 'text', text: 'Blocks until the frame is' },
                { type: 'emphasis', text: 'sent' },
                { type: 'text', text: '.' },
              ],
            ),
          },
        ],
      },
    ],
  };
}

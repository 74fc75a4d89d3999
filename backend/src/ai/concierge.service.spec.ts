import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { LoggingService } from '../logging/logging.service';
import { RoomStore } from '../rooms/room.store';
import { ConciergeService } from './concierge.service';
import { ContextResolver } from './context.resolver';
import { HOTEL_INFO } from './hotel.profile';
import { LLM_CLIENT } from './llm.provider';
import { QueryClassifier } from './query.classifier';
import { ResponseGenerator } from './response.generator';

const completion = (content: string | null) => ({ choices: [{ message: { content } }] });

interface ChatRequest {
  messages: Array<{ role: string; content: string }>;
}

describe('ConciergeService', () => {
  let workDir: string;
  let create: jest.Mock;
  let roomStore: RoomStore;
  let loggingService: LoggingService;
  let service: ConciergeService;

  const generationRequest = (): ChatRequest => {
    const [, second] = create.mock.calls;
    return second[0];
  };

  beforeEach(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'concierge-'));
    create = jest.fn();

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => ({ ROOMS_DB_PATH: join(workDir, 'rooms.db'), LLM_MODEL: 'test-model' })],
        }),
      ],
      providers: [
        ConciergeService,
        QueryClassifier,
        ContextResolver,
        ResponseGenerator,
        RoomStore,
        LoggingService,
        { provide: LLM_CLIENT, useValue: { chat: { completions: { create } } } },
      ],
    }).compile();

    roomStore = moduleRef.get(RoomStore);
    loggingService = moduleRef.get(LoggingService);
    service = moduleRef.get(ConciergeService);
    roomStore.initialize();
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('answers booking queries with every room in table order', async () => {
    roomStore.upsertRoom({ title: 'Ocean View', description: 'Sea facing, king bed' });
    roomStore.upsertRoom({ title: 'Garden Suite', description: 'Private veranda' });
    create
      .mockResolvedValueOnce(completion('1'))
      .mockResolvedValueOnce(completion('We have two rooms available.'));

    const outcome = await service.answer('I want to book a room');

    const expectedContext =
      'Room: Ocean View\nDescription: Sea facing, king bed\n\n' +
      'Room: Garden Suite\nDescription: Private veranda';
    expect(outcome).toEqual({
      status: 'answered',
      category: '1',
      context: expectedContext,
      reply: 'We have two rooms available.',
    });
    expect(generationRequest().messages[1].content).toBe(
      `Query: I want to book a room\nContext: ${expectedContext}`,
    );
  });

  it('uses the fallback text for booking queries when no rooms are stored', async () => {
    create
      .mockResolvedValueOnce(completion('1'))
      .mockResolvedValueOnce(completion('Let me check with the team.'));

    const outcome = await service.answer('Any rooms free this weekend?');

    expect(outcome).toMatchObject({ status: 'answered', context: 'No room details available.' });
  });

  it('answers information queries from the hotel description without reading rooms', async () => {
    const fetchRoomDetails = jest.spyOn(roomStore, 'fetchRoomDetails');
    create
      .mockResolvedValueOnce(completion('2'))
      .mockResolvedValueOnce(completion('Yes, every room has air conditioning.'));

    const outcome = await service.answer('Is there air conditioning?');

    expect(outcome).toEqual({
      status: 'answered',
      category: '2',
      context: HOTEL_INFO,
      reply: 'Yes, every room has air conditioning.',
    });
    expect(generationRequest().messages[1].content).toBe(
      `Query: Is there air conditioning?\nContext: ${HOTEL_INFO}`,
    );
    expect(fetchRoomDetails).not.toHaveBeenCalled();
  });

  it('never generates a reply for an unrecognized category', async () => {
    create.mockResolvedValueOnce(completion('3'));

    const outcome = await service.answer('What is the meaning of life?');

    expect(outcome).toEqual({ status: 'unrecognized_category', category: '3' });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('stops when classification fails', async () => {
    create.mockRejectedValueOnce(new Error('401 Invalid API Key'));

    const outcome = await service.answer('Is breakfast included?');

    expect(outcome).toEqual({ status: 'classification_failed' });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('logs each answered query with its source', async () => {
    const logConciergeEvent = jest.spyOn(loggingService, 'logConciergeEvent');
    create
      .mockResolvedValueOnce(completion('2'))
      .mockResolvedValueOnce(completion('Yoga classes run every morning.'));

    await service.answer('Do you offer yoga?', 'twilio');

    expect(logConciergeEvent).toHaveBeenCalledWith({
      source: 'twilio',
      query: 'Do you offer yoga?',
      category: '2',
      reply: 'Yoga classes run every morning.',
    });
  });

  it('logs long queries truncated to their first 50 characters', async () => {
    const logConciergeEvent = jest.spyOn(loggingService, 'logConciergeEvent');
    const query =
      'Could you tell me whether the hotel offers airport pickup for late arrivals?';
    create
      .mockResolvedValueOnce(completion('2'))
      .mockResolvedValueOnce(completion('Airport pickup can be arranged.'));

    const outcome = await service.answer(query);

    expect(logConciergeEvent).toHaveBeenCalledWith(
      expect.objectContaining({
        source: 'query',
        query: 'Could you tell me whether the hotel offers airport...',
      }),
    );
    expect(generationRequest().messages[1].content).toBe(`Query: ${query}\nContext: ${HOTEL_INFO}`);
    expect(outcome).toMatchObject({ status: 'answered', reply: 'Airport pickup can be arranged.' });
  });
});

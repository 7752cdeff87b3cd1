import type { CommandBusPort, CommandParams, CommandResult } from '@/ports/CommandBusPort';
import type { HomeAssistantClient } from '@/adapters/homeassistant/homeAssistantClient';

export class HomeAssistantCommandBus implements CommandBusPort {
  constructor(private readonly client: HomeAssistantClient) {}

  public call(domain: string, action: string, params: CommandParams): Promise<CommandResult> {
    return this.client.callService(domain, action, params);
  }
}

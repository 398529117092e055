import { BreweryStatus, Lobby } from "@taproom/core";
import { ILobbyRepository } from "../interfaces/IRepositories";
import { Checkpointable } from "./Checkpointable";

export class InMemoryLobbyRepository implements ILobbyRepository, Checkpointable {
  private counter = 0;
  private lobbies = new Map<number, Lobby>();
  private breweries = new Map<string, BreweryStatus>();

  async nextLobbyId(): Promise<number> {
    this.counter += 1;
    return this.counter;
  }

  async insert(lobby: Lobby): Promise<void> {
    this.lobbies.set(lobby.id, { ...lobby });
  }

  async findById(id: number): Promise<Lobby | undefined> {
    const lobby = this.lobbies.get(id);
    return lobby && { ...lobby };
  }

  async update(lobby: Lobby): Promise<void> {
    this.lobbies.set(lobby.id, { ...lobby });
  }

  async findBreweryStatus(lobbyId: number, address: string): Promise<BreweryStatus | undefined> {
    const status = this.breweries.get(breweryKey(lobbyId, address));
    return status && { ...status };
  }

  async saveBreweryStatus(status: BreweryStatus): Promise<void> {
    this.breweries.set(breweryKey(status.lobbyId, status.address), { ...status });
  }

  checkpoint(): () => void {
    const counter = this.counter;
    const lobbies = new Map(this.lobbies);
    const breweries = new Map(this.breweries);
    return () => {
      this.counter = counter;
      this.lobbies = lobbies;
      this.breweries = breweries;
    };
  }
}

function breweryKey(lobbyId: number, address: string): string {
  return `${lobbyId}:${address}`;
}

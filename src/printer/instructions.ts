import { CONFIG_FILE } from "./config.js";
import type { InstallConfig } from "../types/installer.js";

export function configInstructions(block: string): string {
   return `\nThe following should be added to your ${CONFIG_FILE} file.\n\n` + block;
}

export function routerInstructions(config: InstallConfig): string {
   const { base } = config;
   const namespace = config.stages.controllers ? `, ${base}` : "";
   return `
Add the following to your router.ex file.

defmodule ${base}.Router do
  use ${base}.Web, :router
  use Gatekeeper.Router         # Add this

  pipeline :browser do
    plug :accepts, ["html"]
    plug :fetch_session
    plug :fetch_flash
    plug :protect_from_forgery
    plug :put_secure_browser_headers
    plug Gatekeeper.Authentication.Session, login: true  # Add this
  end

  pipeline :public do
    plug :accepts, ["html"]
    plug :fetch_session
    plug :fetch_flash
    plug :protect_from_forgery
    plug :put_secure_browser_headers
    plug Gatekeeper.Authentication.Session               # Add this
  end

  # Add this block
  scope "/"${namespace} do
    pipe_through :public
    gatekeeper_routes :public
  end

  # Add this block
  scope "/"${namespace} do
    pipe_through :browser
    gatekeeper_routes :private
  end

  scope "/", ${base} do
    pipe_through :public
    get "/", PageController, :index
  end

  scope "/", ${base} do
    pipe_through :browser
    # Add your protected routes here
  end
end
`;
}

/** Only needed when we did not generate the model ourselves. */
export function schemaInstructions(config: InstallConfig): string {
   const generated = !config.modelFound && config.stages.boilerplate && config.stages.models;
   if (generated) return "";

   const { base, userSchema, userTableName } = config;
   return `
Add the following items to your ${userSchema} model.

defmodule ${userSchema} do
  use ${base}.Web, :model
  use Gatekeeper.Schema     # Add this

  schema "${userTableName}" do
    field :name, :string
    field :email, :string
    gatekeeper_schema       # Add this

    timestamps()
  end

  def changeset(model, params \\\\ %{}) do
    model
    |> cast(params, [:name, :email] ++ gatekeeper_fields())
    |> validate_required([:name, :email])
    |> unique_constraint(:email)
    |> validate_gatekeeper(params)             # Add this
  end
end
`;
}

export function seedsInstructions(config: InstallConfig): string {
   if (!config.capabilities.includes("authenticatable")) return "";

   const { repo, userSchema } = config;
   return `
You might want to add the following to your priv/repo/seeds.exs file.

${repo}.delete_all ${userSchema}

${userSchema}.changeset(%${userSchema}{}, %{name: "Test User", email: "testuser@example.com", password: "secret", password_confirmation: "secret"})
|> ${repo}.insert!
`;
}

export function migrateInstructions(config: InstallConfig): string {
   if (!config.stages.migrations || !config.stages.boilerplate) return "";
   return `
Don't forget to run the new migrations and seeds with:
    $ mix ecto.setup
`;
}

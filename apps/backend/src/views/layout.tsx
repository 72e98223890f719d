import type { FC, PropsWithChildren } from "hono/jsx";

import type { Identity } from "../auth/identity";

type LayoutProps = {
	title: string;
	identity: Identity;
	flashes: string[];
};

export const Layout: FC<PropsWithChildren<LayoutProps>> = ({ title, identity, flashes, children }) => (
	<html lang="en">
		<head>
			<meta charset="utf-8" />
			<meta name="viewport" content="width=device-width, initial-scale=1" />
			<title>{`${title} | Inkwell`}</title>
			<link
				rel="stylesheet"
				href="https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css"
			/>
		</head>
		<body>
			<nav class="navbar navbar-expand navbar-light border-bottom mb-4">
				<div class="container">
					<a class="navbar-brand" href="/">
						Inkwell
					</a>
					<ul class="navbar-nav ms-auto">
						<li class="nav-item">
							<a class="nav-link" href="/">
								Home
							</a>
						</li>
						{identity.kind === "anonymous" ? (
							<>
								<li class="nav-item">
									<a class="nav-link" href="/login">
										Login
									</a>
								</li>
								<li class="nav-item">
									<a class="nav-link" href="/register">
										Register
									</a>
								</li>
							</>
						) : (
							<li class="nav-item">
								<a class="nav-link" href="/logout">
									Log Out
								</a>
							</li>
						)}
						<li class="nav-item">
							<a class="nav-link" href="/about">
								About
							</a>
						</li>
						<li class="nav-item">
							<a class="nav-link" href="/contact">
								Contact
							</a>
						</li>
					</ul>
				</div>
			</nav>
			<main class="container">
				{flashes.map((message) => (
					<p class="alert alert-warning">{message}</p>
				))}
				{children}
			</main>
			<footer class="container border-top mt-5 py-3 text-muted">
				<small>Copyright © Inkwell {new Date().getFullYear()}</small>
			</footer>
		</body>
	</html>
);

export const PageHeader: FC<{ heading: string; subheading?: string; imgUrl?: string }> = ({
	heading,
	subheading,
	imgUrl,
}) => (
	<header class="mb-4">
		{imgUrl && <img class="img-fluid mb-3" src={imgUrl} alt="" />}
		<h1>{heading}</h1>
		{subheading && <p class="lead">{subheading}</p>}
	</header>
);
